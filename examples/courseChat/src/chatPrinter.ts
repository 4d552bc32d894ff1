// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import chalk from "chalk";
import { CourseAnalytics, FolderIngestResult, Source } from "course-rag";

/**
 * Where chat output goes: process.stdout, or anything else that takes text
 */
export interface ChatOutput {
    write(text: string): unknown;
}

/**
 * Writes chat output to a stream, in color
 */
export class ChatPrinter {
    constructor(public stdout: ChatOutput = process.stdout) {}

    public writeLine(text: string = ""): ChatPrinter {
        this.stdout.write(text + "\n");
        return this;
    }

    public writeInColor(color: chalk.Chalk, text: string): ChatPrinter {
        return this.writeLine(color(text));
    }

    public writeError(message: string): ChatPrinter {
        return this.writeInColor(chalk.red, message);
    }

    public writeAnswer(answer: string): ChatPrinter {
        return this.writeLine().writeLine(answer).writeLine();
    }

    public writeSources(sources: Source[]): ChatPrinter {
        if (sources.length === 0) {
            return this;
        }
        this.writeInColor(chalk.cyan, "Sources:");
        for (const source of sources) {
            this.writeInColor(
                chalk.gray,
                source.link
                    ? `  ${source.label} (${source.link})`
                    : `  ${source.label}`,
            );
        }
        return this.writeLine();
    }

    public writeIngestResult(result: FolderIngestResult): ChatPrinter {
        this.writeInColor(
            chalk.green,
            `Added ${result.courseCount} courses, ${result.chunkCount} chunks`,
        );
        for (const filePath of result.failedFiles) {
            this.writeError(`Could not ingest ${filePath}`);
        }
        return this;
    }

    public writeAnalytics(analytics: CourseAnalytics): ChatPrinter {
        this.writeInColor(
            chalk.cyan,
            `${analytics.totalCourses} courses, ${analytics.totalChunks} chunks`,
        );
        analytics.courseTitles.forEach((title, i) =>
            this.writeLine(`${i + 1}. ${title}`),
        );
        return this;
    }
}
