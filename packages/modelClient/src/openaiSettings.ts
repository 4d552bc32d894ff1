// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { priorityQueue } from "async";
import { EnvSettings, getEnvSetting, getIntFromEnv } from "./common.js";
import { FetchThrottler } from "./restClient.js";

export enum ModelType {
    Chat = "chat",
    Embedding = "embedding",
}

/**
 * Environment variables used to configure model clients
 */
export enum EnvVars {
    OPENAI_API_KEY = "OPENAI_API_KEY",
    OPENAI_ENDPOINT = "OPENAI_ENDPOINT",
    OPENAI_ENDPOINT_EMBEDDING = "OPENAI_ENDPOINT_EMBEDDING",
    OPENAI_ORGANIZATION = "OPENAI_ORGANIZATION",
    OPENAI_MODEL = "OPENAI_MODEL",
    OPENAI_MODEL_EMBEDDING = "OPENAI_MODEL_EMBEDDING",
    OPENAI_MAX_CONCURRENCY = "OPENAI_MAX_CONCURRENCY",

    OLLAMA_ENDPOINT = "OLLAMA_ENDPOINT",
    OLLAMA_MODEL_EMBEDDING = "OLLAMA_MODEL_EMBEDDING",
}

export const DefaultChatEndpoint = "https://api.openai.com/v1/chat/completions";
export const DefaultEmbeddingEndpoint = "https://api.openai.com/v1/embeddings";
export const DefaultChatModelName = "gpt-4o-mini";
export const DefaultEmbeddingModelName = "text-embedding-3-small";

export type CommonApiSettings = {
    modelType: ModelType;
    endpoint: string;
    maxRetryAttempts?: number | undefined;
    retryPauseMs?: number | undefined;
    maxConcurrency?: number | undefined;
    throttler?: FetchThrottler | undefined;
};

export type OpenAIApiSettings = CommonApiSettings & {
    provider: "openai";
    apiKey: string;
    modelName: string;
    organization?: string | undefined;
};

/**
 * Load settings for the OpenAI services from env
 * @param modelType Chat or Embedding
 * @param env Environment variables
 * @param endpointName Name of endpoint, e.g. GPT_4_O. This is appended as a suffix to base environment key
 */
export function openAIApiSettingsFromEnv(
    modelType: ModelType,
    env?: EnvSettings,
    endpointName?: string,
): OpenAIApiSettings {
    env ??= process.env;
    const isChat = modelType === ModelType.Chat;
    const settings: OpenAIApiSettings = {
        provider: "openai",
        modelType,
        apiKey: getEnvSetting(env, EnvVars.OPENAI_API_KEY, endpointName),
        endpoint: getEnvSetting(
            env,
            isChat ? EnvVars.OPENAI_ENDPOINT : EnvVars.OPENAI_ENDPOINT_EMBEDDING,
            endpointName,
            isChat ? DefaultChatEndpoint : DefaultEmbeddingEndpoint,
        ),
        modelName: getEnvSetting(
            env,
            isChat ? EnvVars.OPENAI_MODEL : EnvVars.OPENAI_MODEL_EMBEDDING,
            endpointName,
            isChat ? DefaultChatModelName : DefaultEmbeddingModelName,
        ),
        organization:
            getEnvSetting(env, EnvVars.OPENAI_ORGANIZATION, endpointName, "") ||
            undefined,
        maxConcurrency: getIntFromEnv(
            env,
            EnvVars.OPENAI_MAX_CONCURRENCY,
            endpointName,
        ),
    };
    settings.throttler = createThrottler(settings.maxConcurrency);
    return settings;
}

/**
 * Limits how many requests run at once against an endpoint
 * @returns undefined if there is no limit
 */
export function createThrottler(
    maxConcurrency: number | undefined,
): FetchThrottler | undefined {
    if (maxConcurrency === undefined) {
        return undefined;
    }
    const q = priorityQueue<() => Promise<Response>>(
        async (task) => task(),
        maxConcurrency,
    );
    return (fn) => q.push<Response>(fn, 0);
}
