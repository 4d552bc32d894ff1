// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { TextEmbeddingModel } from "model-client";
import registerDebug from "debug";
import { getData } from "typechat";
import { createNormalized, NormalizedEmbedding } from "./vector.js";

const debugEmbeddings = registerDebug("vector-store:embeddings");

export type EmbeddingRetrySettings = {
    // Retries after the first attempt fails. 0 means no retry
    retryMaxAttempts: number;
    // Pause before the first retry; doubled for each further retry
    retryPauseMs: number;
};

/**
 * Normalized embedding of a single text
 */
export async function generateEmbedding(
    model: TextEmbeddingModel,
    text: string,
    retry?: EmbeddingRetrySettings,
): Promise<NormalizedEmbedding> {
    return withRetry(
        async () => createNormalized(getData(await model.generateEmbedding(text))),
        retry,
    );
}

/**
 * Normalized embeddings of texts, in the same order.
 * Models that batch get texts in batches of maxBatchSize; others get one text per call,
 * with up to `concurrency` calls in flight
 */
export async function generateTextEmbeddings(
    model: TextEmbeddingModel,
    texts: string[],
    retry?: EmbeddingRetrySettings,
    concurrency: number = 1,
): Promise<NormalizedEmbedding[]> {
    const generateBatch = model.generateEmbeddingBatch;
    if (model.maxBatchSize > 1 && generateBatch !== undefined) {
        const embeddings: NormalizedEmbedding[] = [];
        for (let start = 0; start < texts.length; start += model.maxBatchSize) {
            const batch = texts.slice(start, start + model.maxBatchSize);
            const batchEmbeddings = await withRetry(async () => {
                const result = getData(await generateBatch.call(model, batch));
                if (result.length !== batch.length) {
                    throw new Error(
                        `Expected ${batch.length} embeddings, got ${result.length}`,
                    );
                }
                return result;
            }, retry);
            embeddings.push(...batchEmbeddings.map((e) => createNormalized(e)));
        }
        return embeddings;
    }
    return mapConcurrent(texts, concurrency, (text) =>
        generateEmbedding(model, text, retry),
    );
}

async function withRetry<T>(
    fn: () => Promise<T>,
    retry?: EmbeddingRetrySettings,
): Promise<T> {
    let pauseMs = retry?.retryPauseMs ?? 0;
    for (let attempt = 0; ; ++attempt) {
        try {
            return await fn();
        } catch (e) {
            if (attempt >= (retry?.retryMaxAttempts ?? 0)) {
                throw e;
            }
            debugEmbeddings(`Retrying after error: ${e}`);
        }
        await new Promise((resolve) => setTimeout(resolve, pauseMs));
        pauseMs *= 2;
    }
}

/**
 * Run fn over items with at most `concurrency` calls pending; results keep the input order
 */
async function mapConcurrent<T, TResult>(
    items: T[],
    concurrency: number,
    fn: (item: T) => Promise<TResult>,
): Promise<TResult[]> {
    const results = new Array<TResult>(items.length);
    let next = 0;
    const worker = async () => {
        while (next < items.length) {
            const i = next++;
            results[i] = await fn(items[i]);
        }
    };
    const workerCount = Math.max(1, Math.min(concurrency, items.length));
    await Promise.all(Array.from({ length: workerCount }, worker));
    return results;
}
