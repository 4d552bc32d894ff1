// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    createModelsFromEnv,
    DefaultRagConfig,
    ragConfigFromEnv,
    validateRagConfig,
} from "../src/config.js";

describe("config", () => {
    test("defaults", () => {
        expect(ragConfigFromEnv({})).toEqual({
            ...DefaultRagConfig,
            indexPath: undefined,
        });
        expect(DefaultRagConfig).toEqual({
            chunkSize: 800,
            chunkOverlap: 100,
            maxResults: 5,
            maxHistory: 2,
        });
    });
    test("overrides", () => {
        expect(
            ragConfigFromEnv({
                CHUNK_SIZE: "400",
                CHUNK_OVERLAP: "0",
                MAX_RESULTS: "3",
                MAX_HISTORY: "0",
                COURSE_INDEX_PATH: "/tmp/courses",
            }),
        ).toEqual({
            chunkSize: 400,
            chunkOverlap: 0,
            maxResults: 3,
            maxHistory: 0,
            indexPath: "/tmp/courses",
        });
    });
    test("invalid", () => {
        expect(() => ragConfigFromEnv({ CHUNK_SIZE: "abc" })).toThrow(
            "Invalid value for CHUNK_SIZE: abc",
        );
        expect(() => ragConfigFromEnv({ CHUNK_OVERLAP: "900" })).toThrow();
        expect(() => ragConfigFromEnv({ MAX_RESULTS: "-1" })).toThrow();
        expect(() =>
            validateRagConfig({ ...DefaultRagConfig, chunkOverlap: 800 }),
        ).toThrow();
        expect(() =>
            validateRagConfig({ ...DefaultRagConfig, maxHistory: 1.5 }),
        ).toThrow("Invalid max history: 1.5");
    });
    test("models", () => {
        expect(() => createModelsFromEnv({})).toThrow(
            "Missing ApiSetting: OPENAI_API_KEY",
        );
        const models = createModelsFromEnv({ OPENAI_API_KEY: "test-key" });
        expect(models.chatModel.completionSettings).toEqual({
            temperature: 0,
            max_tokens: 800,
        });
        expect(models.embeddingModel.maxBatchSize).toBe(2048);

        const local = createModelsFromEnv({
            OPENAI_API_KEY: "test-key",
            OLLAMA_ENDPOINT: "http://localhost:11434",
        });
        expect(local.embeddingModel.maxBatchSize).toBe(1);
    });
});
