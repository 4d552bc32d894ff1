// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// Sentence ends: . ! or ? followed by whitespace and an upper-case letter,
// but not after abbreviations such as "e.g." or "Dr."
const sentenceBoundary = /(?<!\w\.\w.)(?<![A-Z][a-z]\.)(?<=[.!?])\s+(?=[A-Z])/;

export function splitIntoLines(text: string): string[] {
    return text.split(/\r?\n/);
}

/**
 * Collapse all runs of whitespace into single spaces
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

export function splitIntoSentences(text: string): string[] {
    return text
        .split(sentenceBoundary)
        .map((s) => s.trim())
        .filter((s) => s.length > 0);
}

/**
 * Split text longer than maxChars into pieces of at most maxChars.
 * Splits at the last space inside each window when there is one
 */
export function hardSplit(text: string, maxChars: number): string[] {
    const pieces: string[] = [];
    let rest = text;
    while (rest.length > maxChars) {
        const window = rest.slice(0, maxChars + 1);
        const splitAt = window.lastIndexOf(" ");
        if (splitAt > 0) {
            pieces.push(rest.slice(0, splitAt).trimEnd());
            rest = rest.slice(splitAt + 1).trimStart();
        } else {
            pieces.push(rest.slice(0, maxChars));
            rest = rest.slice(maxChars);
        }
    }
    if (rest.length > 0) {
        pieces.push(rest);
    }
    return pieces;
}
