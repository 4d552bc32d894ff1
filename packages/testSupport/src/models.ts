// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    ChatTurn,
    CompletionSettings,
    TextEmbeddingModel,
    ToolCall,
    ToolChatModel,
    ToolChatResponse,
    ToolDefinition,
} from "model-client";
import { Result, success, error } from "typechat";

/**
 * Deterministic in-process embeddings: one dimension per distinct lower-cased word,
 * assigned in the order words are first seen. Texts sharing words score higher
 */
export class VocabularyEmbeddingModel implements TextEmbeddingModel {
    public inputCount: number = 0;
    private vocabulary = new Map<string, number>();

    constructor(
        public readonly dimensions: number = 2048,
        public readonly maxBatchSize: number = 16,
    ) {}

    public async generateEmbeddingBatch(
        inputs: string[],
    ): Promise<Result<number[][]>> {
        return success(inputs.map((input) => this.embed(input)));
    }

    public async generateEmbedding(input: string): Promise<Result<number[]>> {
        if (!input) {
            return error("Empty input");
        }
        return success(this.embed(input));
    }

    private embed(input: string): number[] {
        this.inputCount++;
        const embedding = new Array<number>(this.dimensions).fill(0);
        for (const word of input.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
            embedding[this.dimensionOf(word)] += 1;
        }
        return embedding;
    }

    private dimensionOf(word: string): number {
        let dimension = this.vocabulary.get(word);
        if (dimension === undefined) {
            dimension = this.vocabulary.size % this.dimensions;
            this.vocabulary.set(word, dimension);
        }
        return dimension;
    }
}

export type ChatModelCall = {
    systemContext: string;
    turns: ChatTurn[];
    tools: ToolDefinition[] | undefined;
};

/**
 * Chat model that replays scripted responses in order and records every call
 */
export class ScriptedChatModel implements ToolChatModel {
    public completionSettings: CompletionSettings = {};
    public calls: ChatModelCall[] = [];

    constructor(private responses: Result<ToolChatResponse>[]) {}

    public async completeWithTools(
        systemContext: string,
        turns: ChatTurn[],
        tools?: ToolDefinition[],
    ): Promise<Result<ToolChatResponse>> {
        this.calls.push({ systemContext, turns: [...turns], tools });
        const response = this.responses.shift();
        return response ?? error("No scripted response left");
    }
}

export function answerResponse(text: string): Result<ToolChatResponse> {
    return success({ type: "answer", text });
}

export function toolUseResponse(
    toolCalls: ToolCall[],
    text: string = "",
): Result<ToolChatResponse> {
    return success({ type: "toolUse", text, toolCalls });
}
