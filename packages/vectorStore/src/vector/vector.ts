// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export type Vector = number[] | Float32Array;

/**
 * Embedding scaled to unit length: the dot product of two is their cosine similarity
 */
export type NormalizedEmbedding = Float32Array;

export function dotProduct(x: Vector, y: Vector): number {
    if (x.length !== y.length) {
        throw new Error(`Vector length mismatch: ${x.length}, ${y.length}`);
    }
    let sum = 0;
    for (let i = 0; i < x.length; ++i) {
        sum += x[i] * y[i];
    }
    return sum;
}

/**
 * Copy src into a unit-length embedding. A zero vector stays zero
 */
export function createNormalized(src: Vector): NormalizedEmbedding {
    const embedding = Float32Array.from(src);
    const length = Math.sqrt(dotProduct(embedding, embedding));
    if (length > 0) {
        embedding.forEach((value, i) => {
            embedding[i] = value / length;
        });
    }
    return embedding;
}
