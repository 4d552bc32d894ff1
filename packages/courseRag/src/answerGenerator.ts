// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    ChatTurn,
    ToolCall,
    ToolChatModel,
    ToolChatResponse,
    ToolDefinition,
} from "model-client";
import registerDebug from "debug";
import { Result } from "typechat";
import { Source } from "./models.js";
import { SourceList, ToolRegistry, ToolResult } from "./tools.js";

const debugAnswer = registerDebug("course-rag:answer");

export const SystemPrompt = `You are an AI assistant specialized in course materials and educational content with access to tools for course information.

Tool usage:
- Use the content search tool for questions about specific course content or detailed educational materials
- Use the course outline tool for questions about a course's structure, instructor, link or list of lessons
- Use at most one round of tool calls per query
- Synthesize tool results into accurate, fact-based responses
- If a tool yields no results, state this clearly without offering alternatives

Response protocol:
- General knowledge questions: answer using existing knowledge without using tools
- Course-specific questions: use a tool first, then answer
- No meta-commentary: provide direct answers only. Do not explain your reasoning or tool usage, and do not mention "based on the search results"

All responses must be:
1. Brief and focused
2. Educational
3. Clear
4. Supported by examples when they aid understanding

Provide only the direct answer to what was asked.`;

export type GeneratedAnswer = {
    answer: string;
    sources: Source[];
};

/**
 * Answer generation is a two-state machine:
 *  awaitingFirstResponse -> answered               (the model answered directly)
 *  awaitingFirstResponse -> awaitingSecondResponse -> answered
 *                                                  (the model asked for tools)
 * The second call offers no tools, so there is at most one tool round
 */
export type AnswerState =
    | { state: "awaitingFirstResponse"; turns: ChatTurn[] }
    | {
          state: "awaitingSecondResponse";
          turns: ChatTurn[];
          sources: Source[];
      }
    | { state: "answered"; answer: string; sources: Source[] };

/**
 * A model call failed
 */
export class AnswerGenerationError extends Error {
    constructor(
        message: string,
        public readonly state: AnswerState["state"],
    ) {
        super(message);
        this.name = "AnswerGenerationError";
    }
}

export interface IAnswerGenerator {
    /**
     * Answer a query, using tools when the model asks for them
     * @param query
     * @param history previous conversation, formatted
     */
    generateAnswer(query: string, history?: string): Promise<GeneratedAnswer>;
}

export type AnswerGeneratorSettings = {
    systemPrompt: string;
};

export function createAnswerGeneratorSettings(): AnswerGeneratorSettings {
    return { systemPrompt: SystemPrompt };
}

export class AnswerGenerator implements IAnswerGenerator {
    constructor(
        public readonly model: ToolChatModel,
        public readonly tools: ToolRegistry,
        public readonly settings: AnswerGeneratorSettings = createAnswerGeneratorSettings(),
    ) {}

    public async generateAnswer(
        query: string,
        history?: string,
    ): Promise<GeneratedAnswer> {
        const systemContext = history
            ? `${this.settings.systemPrompt}\n\nPrevious conversation:\n${history}`
            : this.settings.systemPrompt;

        let state: AnswerState = {
            state: "awaitingFirstResponse",
            turns: [
                {
                    role: "user",
                    content: `Answer this question about course materials: ${query}`,
                },
            ],
        };
        while (state.state !== "answered") {
            state = await this.step(systemContext, state);
        }
        return { answer: state.answer, sources: state.sources };
    }

    private async step(
        systemContext: string,
        current: Exclude<AnswerState, { state: "answered" }>,
    ): Promise<AnswerState> {
        switch (current.state) {
            case "awaitingFirstResponse": {
                const definitions = this.tools.getDefinitions();
                const response = await this.complete(
                    current,
                    systemContext,
                    definitions.length > 0 ? definitions : undefined,
                );
                if (response.type === "answer") {
                    debugAnswer("Answered without tools");
                    return {
                        state: "answered",
                        answer: response.text,
                        sources: [],
                    };
                }
                return this.runTools(current.turns, response);
            }
            case "awaitingSecondResponse": {
                const response = await this.complete(current, systemContext);
                // Final regardless of what it asks for
                return {
                    state: "answered",
                    answer: response.text,
                    sources: current.sources,
                };
            }
        }
    }

    /**
     * Run the requested tools one at a time, in request order
     */
    private async runTools(
        turns: ChatTurn[],
        response: Extract<ToolChatResponse, { type: "toolUse" }>,
    ): Promise<AnswerState> {
        const nextTurns: ChatTurn[] = [
            ...turns,
            {
                role: "assistant",
                content: response.text,
                toolCalls: response.toolCalls,
            },
        ];
        const sources = new SourceList();
        for (const call of response.toolCalls) {
            const result = await this.runTool(call);
            nextTurns.push({
                role: "tool",
                toolCallId: call.id,
                content: result.text,
            });
            sources.addAll(result.sources);
        }
        return {
            state: "awaitingSecondResponse",
            turns: nextTurns,
            sources: sources.values,
        };
    }

    private async runTool(call: ToolCall): Promise<ToolResult> {
        debugAnswer(`Tool call ${call.name}`);
        return this.tools.execute(call.name, call.arguments);
    }

    private async complete(
        current: Exclude<AnswerState, { state: "answered" }>,
        systemContext: string,
        tools?: ToolDefinition[],
    ): Promise<ToolChatResponse> {
        const result: Result<ToolChatResponse> =
            await this.model.completeWithTools(
                systemContext,
                current.turns,
                tools,
            );
        if (!result.success) {
            throw new AnswerGenerationError(result.message, current.state);
        }
        return result.data;
    }
}
