// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Result, success, error } from "typechat";
import { EnvSettings, getEnvSetting } from "./common.js";
import { TextEmbeddingModel } from "./models.js";
import { callJsonApi } from "./restClient.js";
import { CommonApiSettings, EnvVars, ModelType } from "./openaiSettings.js";

export type OllamaApiSettings = CommonApiSettings & {
    provider: "ollama";
    modelName: string;
};

export const DefaultOllamaEmbeddingModel = "nomic-embed-text";

export function ollamaApiSettingsFromEnv(
    env?: EnvSettings,
    endpointName?: string,
): OllamaApiSettings {
    env ??= process.env;
    const url = getEnvSetting(
        env,
        EnvVars.OLLAMA_ENDPOINT,
        endpointName,
        "http://localhost:11434",
    );
    return {
        provider: "ollama",
        modelType: ModelType.Embedding,
        endpoint: `${url}/api/embeddings`,
        modelName: getEnvSetting(
            env,
            EnvVars.OLLAMA_MODEL_EMBEDDING,
            endpointName,
            DefaultOllamaEmbeddingModel,
        ),
    };
}

type OllamaEmbeddingResponse = {
    embedding: number[];
};

function isOllamaEmbeddingResponse(
    value: unknown,
): value is OllamaEmbeddingResponse {
    return (
        typeof value === "object" &&
        value !== null &&
        "embedding" in value &&
        Array.isArray(value.embedding)
    );
}

/**
 * Embedding model served by a local Ollama instance.
 * Ollama embeds one text per request, so there is no batching.
 */
export function createOllamaEmbeddingModel(
    settings?: OllamaApiSettings,
): TextEmbeddingModel {
    const apiSettings = settings ?? ollamaApiSettingsFromEnv();
    return {
        maxBatchSize: 1,
        generateEmbedding,
    };

    async function generateEmbedding(input: string): Promise<Result<number[]>> {
        if (!input) {
            return error("Empty input");
        }
        const result = await callJsonApi(
            {},
            apiSettings.endpoint,
            { model: apiSettings.modelName, prompt: input },
            {
                retryMaxAttempts: apiSettings.maxRetryAttempts,
                retryPauseMs: apiSettings.retryPauseMs,
            },
        );
        if (!result.success) {
            return result;
        }
        if (!isOllamaEmbeddingResponse(result.data)) {
            return error("Ollama returned no embedding");
        }
        return success(result.data.embedding);
    }
}
