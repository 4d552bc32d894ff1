// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Result, success, error } from "typechat";
import registerDebug from "debug";
import {
    ChatTurn,
    CompletionSettings,
    TextEmbeddingModel,
    ToolArguments,
    ToolCall,
    ToolChatModel,
    ToolChatResponse,
    ToolDefinition,
} from "./models.js";
import { callJsonApi } from "./restClient.js";
import {
    ModelType,
    OpenAIApiSettings,
    openAIApiSettingsFromEnv,
} from "./openaiSettings.js";

export {
    EnvVars,
    ModelType,
    openAIApiSettingsFromEnv,
} from "./openaiSettings.js";
export type { OpenAIApiSettings } from "./openaiSettings.js";

const debugOpenAI = registerDebug("model-client:openai");

// Statistics returned by the OAI api
export type CompletionUsageStats = {
    completion_tokens: number;
    prompt_tokens: number;
    total_tokens: number;
};

// NOTE: these are not complete
type WireToolCall = {
    id: string;
    type: "function";
    function: {
        name: string;
        arguments: string;
    };
};

type WireMessage =
    | { role: "system" | "user"; content: string }
    | {
          role: "assistant";
          content: string | null;
          tool_calls?: WireToolCall[] | undefined;
      }
    | { role: "tool"; tool_call_id: string; content: string };

type ChatCompletionChoice = {
    message?: {
        role: "assistant";
        content?: string | null;
        tool_calls?: WireToolCall[];
    };
    finish_reason?: string;
};

type ChatCompletion = {
    id: string;
    choices: ChatCompletionChoice[];
    usage?: CompletionUsageStats;
};

type EmbeddingData = { data: { embedding: number[] }[] };

function isChatCompletion(value: unknown): value is ChatCompletion {
    return (
        typeof value === "object" &&
        value !== null &&
        "choices" in value &&
        Array.isArray(value.choices)
    );
}

function isEmbeddingData(value: unknown): value is EmbeddingData {
    return (
        typeof value === "object" &&
        value !== null &&
        "data" in value &&
        Array.isArray(value.data)
    );
}

function createApiHeaders(settings: OpenAIApiSettings): Record<string, string> {
    const headers: Record<string, string> = {
        Authorization: `Bearer ${settings.apiKey}`,
    };
    if (settings.organization) {
        headers["OpenAI-Organization"] = settings.organization;
    }
    return headers;
}

/**
 * Create a client for an OpenAI compatible chat model that supports tool calling
 *  createChatModel()
 *     Initialize using standard env variables
 *  createChatModel(openAIApiSettingsFromEnv(ModelType.Chat, env, "GPT_4_O"))
 *     You supply API settings
 * @param settings settings to use for creating client
 * @param completionSettings Completion settings for the model. Temperature defaults to 0
 */
export function createChatModel(
    settings?: OpenAIApiSettings,
    completionSettings?: CompletionSettings,
): ToolChatModel {
    const apiSettings = settings ?? openAIApiSettingsFromEnv(ModelType.Chat);
    completionSettings ??= {};
    completionSettings.temperature ??= 0;

    const model: ToolChatModel = {
        completionSettings,
        completeWithTools,
    };
    return model;

    async function completeWithTools(
        systemContext: string,
        turns: ChatTurn[],
        tools?: ToolDefinition[],
    ): Promise<Result<ToolChatResponse>> {
        const messages: WireMessage[] = [
            { role: "system", content: systemContext },
            ...turns.map(toWireMessage),
        ];
        const params: Record<string, unknown> = {
            model: apiSettings.modelName,
            messages,
            ...model.completionSettings,
        };
        if (tools && tools.length > 0) {
            params.tools = tools.map((t) => ({
                type: "function",
                function: {
                    name: t.name,
                    description: t.description,
                    parameters: t.parameters,
                },
            }));
            params.tool_choice = "auto";
        }
        const result = await callJsonApi(
            createApiHeaders(apiSettings),
            apiSettings.endpoint,
            params,
            {
                retryMaxAttempts: apiSettings.maxRetryAttempts,
                retryPauseMs: apiSettings.retryPauseMs,
                throttler: apiSettings.throttler,
            },
        );
        if (!result.success) {
            return result;
        }
        const data = result.data;
        if (!isChatCompletion(data) || data.choices.length === 0) {
            return error("No choices returned");
        }
        if (data.usage) {
            debugOpenAI(
                `Tokens: prompt ${data.usage.prompt_tokens}, completion ${data.usage.completion_tokens}`,
            );
        }
        const message = data.choices[0].message;
        const text = message?.content ?? "";
        const wireCalls = message?.tool_calls ?? [];
        if (wireCalls.length === 0) {
            const answer: ToolChatResponse = { type: "answer", text };
            return success(answer);
        }
        const toolCalls: ToolCall[] = [];
        for (const c of wireCalls) {
            if (c.type !== "function") {
                return error("Invalid tool call type");
            }
            const args = parseToolArguments(c.function.arguments);
            if (!args.success) {
                return args;
            }
            toolCalls.push({
                id: c.id,
                name: c.function.name,
                arguments: args.data,
            });
        }
        const toolUse: ToolChatResponse = { type: "toolUse", text, toolCalls };
        return success(toolUse);
    }
}

function toWireMessage(turn: ChatTurn): WireMessage {
    switch (turn.role) {
        case "user":
            return { role: "user", content: turn.content };
        case "assistant":
            return {
                role: "assistant",
                content: turn.content || null,
                tool_calls: turn.toolCalls?.map(toWireToolCall),
            };
        case "tool":
            return {
                role: "tool",
                tool_call_id: turn.toolCallId,
                content: turn.content,
            };
    }
}

function toWireToolCall(call: ToolCall): WireToolCall {
    return {
        id: call.id,
        type: "function",
        function: {
            name: call.name,
            arguments: JSON.stringify(call.arguments),
        },
    };
}

/**
 * Tool arguments arrive as a JSON encoded object
 */
export function parseToolArguments(json: string): Result<ToolArguments> {
    if (!json) {
        return success({});
    }
    let value: unknown;
    try {
        value = JSON.parse(json);
    } catch {
        return error(`Tool arguments are not valid JSON: ${json}`);
    }
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
        return error(`Tool arguments must be an object: ${json}`);
    }
    return success({ ...value });
}

/**
 * Create a client for the OpenAI embeddings service
 * @param settings settings to use to create the client
 * @param dimensions (optional) text-embedding-3 and later models allow variable length embeddings
 */
export function createEmbeddingModel(
    settings?: OpenAIApiSettings,
    dimensions?: number | undefined,
): TextEmbeddingModel {
    const apiSettings =
        settings ?? openAIApiSettingsFromEnv(ModelType.Embedding);
    // https://platform.openai.com/docs/api-reference/embeddings/create#embeddings-create-input
    const maxBatchSize = 2048;
    const defaultParams: Record<string, unknown> = {
        model: apiSettings.modelName,
    };
    if (dimensions && dimensions > 0) {
        defaultParams.dimensions = dimensions;
    }
    const model: TextEmbeddingModel = {
        generateEmbedding,
        generateEmbeddingBatch,
        maxBatchSize,
    };
    return model;

    async function generateEmbedding(input: string): Promise<Result<number[]>> {
        if (!input) {
            return error("Empty input");
        }
        const result = await callApi(input);
        if (!result.success) {
            return result;
        }
        return success(result.data[0]);
    }

    async function generateEmbeddingBatch(
        input: string[],
    ): Promise<Result<number[][]>> {
        if (input.length === 0) {
            return error("Empty input array");
        }
        if (input.length > maxBatchSize) {
            return error(`Batch size must be < ${maxBatchSize}`);
        }
        return callApi(input);
    }

    async function callApi(
        input: string | string[],
    ): Promise<Result<number[][]>> {
        const result = await callJsonApi(
            createApiHeaders(apiSettings),
            apiSettings.endpoint,
            { ...defaultParams, input },
            {
                retryMaxAttempts: apiSettings.maxRetryAttempts,
                retryPauseMs: apiSettings.retryPauseMs,
                throttler: apiSettings.throttler,
            },
        );
        if (!result.success) {
            return result;
        }
        const data = result.data;
        if (!isEmbeddingData(data) || data.data.length === 0) {
            return error("No embeddings returned");
        }
        return success(data.data.map((d) => d.embedding));
    }
}
