// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    EnvSettings,
    getEnvSetting,
    getIntFromEnv,
    hasEnvSettings,
    openai,
    createOllamaEmbeddingModel,
    ollamaApiSettingsFromEnv,
    TextEmbeddingModel,
    ToolChatModel,
} from "model-client";

export enum ConfigVars {
    CHUNK_SIZE = "CHUNK_SIZE",
    CHUNK_OVERLAP = "CHUNK_OVERLAP",
    MAX_RESULTS = "MAX_RESULTS",
    MAX_HISTORY = "MAX_HISTORY",
    COURSE_INDEX_PATH = "COURSE_INDEX_PATH",
}

export type RagConfig = {
    // Maximum characters per chunk
    chunkSize: number;
    // Characters shared by consecutive chunks
    chunkOverlap: number;
    // Top-K passages returned by a search
    maxResults: number;
    // Exchanges retained per session
    maxHistory: number;
    // Folder the collections are saved to. Memory only if undefined
    indexPath?: string | undefined;
};

export const DefaultRagConfig: RagConfig = {
    chunkSize: 800,
    chunkOverlap: 100,
    maxResults: 5,
    maxHistory: 2,
};

/**
 * Read the configuration from environment variables, using defaults for those not set
 * Load .env first (dotenv) to pick up settings from a file
 */
export function ragConfigFromEnv(env?: EnvSettings): RagConfig {
    env ??= process.env;
    const config: RagConfig = {
        chunkSize:
            getIntFromEnv(env, ConfigVars.CHUNK_SIZE) ??
            DefaultRagConfig.chunkSize,
        chunkOverlap: getNonNegativeIntFromEnv(
            env,
            ConfigVars.CHUNK_OVERLAP,
            DefaultRagConfig.chunkOverlap,
        ),
        maxResults:
            getIntFromEnv(env, ConfigVars.MAX_RESULTS) ??
            DefaultRagConfig.maxResults,
        maxHistory: getNonNegativeIntFromEnv(
            env,
            ConfigVars.MAX_HISTORY,
            DefaultRagConfig.maxHistory,
        ),
        indexPath:
            getEnvSetting(env, ConfigVars.COURSE_INDEX_PATH, undefined, "") ||
            undefined,
    };
    validateRagConfig(config);
    return config;
}

export function validateRagConfig(config: RagConfig): void {
    if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
        throw new Error(`Invalid chunk size: ${config.chunkSize}`);
    }
    if (
        !Number.isInteger(config.chunkOverlap) ||
        config.chunkOverlap < 0 ||
        config.chunkOverlap >= config.chunkSize
    ) {
        throw new Error(
            `Chunk overlap must be >= 0 and < chunk size ${config.chunkSize}: ${config.chunkOverlap}`,
        );
    }
    if (!Number.isInteger(config.maxResults) || config.maxResults <= 0) {
        throw new Error(`Invalid max results: ${config.maxResults}`);
    }
    if (!Number.isInteger(config.maxHistory) || config.maxHistory < 0) {
        throw new Error(`Invalid max history: ${config.maxHistory}`);
    }
}

// Overlap and history may be turned off with 0
function getNonNegativeIntFromEnv(
    env: EnvSettings,
    envName: string,
    defaultValue: number,
): number {
    if (getEnvSetting(env, envName, undefined, "") === "0") {
        return 0;
    }
    return getIntFromEnv(env, envName) ?? defaultValue;
}

export type RagModels = {
    chatModel: ToolChatModel;
    embeddingModel: TextEmbeddingModel;
};

/**
 * Create the chat and embedding models from environment variables.
 * Embeddings come from Ollama when OLLAMA_ENDPOINT is set and no OpenAI embedding endpoint is
 */
export function createModelsFromEnv(env?: EnvSettings): RagModels {
    env ??= process.env;
    const chatModel = openai.createChatModel(
        openai.openAIApiSettingsFromEnv(openai.ModelType.Chat, env),
        { temperature: 0, max_tokens: 800 },
    );
    const useOllama =
        hasEnvSettings(env, openai.EnvVars.OLLAMA_ENDPOINT) &&
        !hasEnvSettings(env, openai.EnvVars.OPENAI_ENDPOINT_EMBEDDING);
    const embeddingModel = useOllama
        ? createOllamaEmbeddingModel(ollamaApiSettingsFromEnv(env))
        : openai.createEmbeddingModel(
              openai.openAIApiSettingsFromEnv(openai.ModelType.Embedding, env),
          );
    return { chatModel, embeddingModel };
}
