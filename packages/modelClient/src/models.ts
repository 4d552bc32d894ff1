// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Result } from "typechat";

/**
 * Completion settings for chat models
 * https://platform.openai.com/docs/api-reference/chat/create
 */
export type CompletionSettings = {
    temperature?: number;
    max_tokens?: number;
    // Use fixed seed parameter to improve determinism
    seed?: number;
    top_p?: number;
};

export type JsonSchemaType = "string" | "integer" | "number" | "boolean";

export type JsonSchemaProperty = {
    type: JsonSchemaType;
    description?: string;
};

/**
 * Parameter contract of a tool, expressed as a JSON schema object
 */
export type ToolParameters = {
    type: "object";
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
};

export type ToolDefinition = {
    name: string;
    description: string;
    parameters: ToolParameters;
};

export type ToolArguments = Record<string, unknown>;

/**
 * A tool invocation requested by the model
 */
export type ToolCall = {
    id: string;
    name: string;
    arguments: ToolArguments;
};

export type UserTurn = {
    role: "user";
    content: string;
};

export type AssistantTurn = {
    role: "assistant";
    content: string;
    toolCalls?: ToolCall[] | undefined;
};

export type ToolResultTurn = {
    role: "tool";
    toolCallId: string;
    content: string;
};

export type ChatTurn = UserTurn | AssistantTurn | ToolResultTurn;

/**
 * What a model returns for a tool-enabled completion: either the final text,
 * or one or more tool invocations to run before asking again
 */
export type ToolChatResponse =
    | { type: "answer"; text: string }
    | { type: "toolUse"; text: string; toolCalls: ToolCall[] };

/**
 * A chat model that can be offered tools
 */
export interface ToolChatModel {
    completionSettings: CompletionSettings;
    /**
     * Complete the conversation
     * @param systemContext instructions and context for the model
     * @param turns conversation turns, oldest first
     * @param tools tools the model may ask to invoke. If omitted, the model must answer directly
     */
    completeWithTools(
        systemContext: string,
        turns: ChatTurn[],
        tools?: ToolDefinition[],
    ): Promise<Result<ToolChatResponse>>;
}

/**
 * A model that returns embeddings for the input K
 */
export interface EmbeddingModel<K> {
    /**
     * Generate an embedding for the given input
     * @param input
     */
    generateEmbedding(input: K): Promise<Result<number[]>>;
}

/**
 * A Model that generates embeddings for the given input
 */
export interface TextEmbeddingModel extends EmbeddingModel<string> {
    /**
     * Optional: batching support
     * Not all models/apis support batching
     * @param inputs
     */
    generateEmbeddingBatch?(inputs: string[]): Promise<Result<number[][]>>;
    /**
     * Maximum batch size
     * If no batching, maxBatchSize should be 1
     */
    readonly maxBatchSize: number;
}
