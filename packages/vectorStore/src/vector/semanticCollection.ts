// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { TextEmbeddingModel } from "model-client";
import registerDebug from "debug";
import { ScoredItem } from "../common.js";
import {
    EmbeddingRetrySettings,
    generateEmbedding,
    generateTextEmbeddings,
} from "./embeddingGenerator.js";
import { TopNCollection } from "./topN.js";
import { dotProduct, NormalizedEmbedding } from "./vector.js";

const debugCollection = registerDebug("vector-store:collection");

export type MetadataValue = string | number | boolean;
/**
 * Flat metadata stored beside each document. Filters compare these values for equality
 */
export type Metadata = { [key: string]: MetadataValue | undefined };

/**
 * Equality filter over metadata fields, combined with AND.
 * Fields set to undefined are ignored
 */
export type MetadataFilter<TMeta extends Metadata> = Partial<TMeta>;

export type CollectionItem<TMeta extends Metadata> = {
    id: string;
    document: string;
    metadata: TMeta;
};

export type CollectionRecord<TMeta extends Metadata> = CollectionItem<TMeta> & {
    embedding: NormalizedEmbedding;
};

export type CollectionSettings = {
    /**
     * Concurrency used when the embedding model does not batch. Default is 1
     */
    concurrency?: number | undefined;
    retryMaxAttempts?: number | undefined;
    retryPauseMs?: number | undefined;
};

/**
 * An in-memory collection of documents with metadata, searchable by embedding similarity.
 * Ids are unique: adding an existing id replaces its record
 */
export interface SemanticCollection<TMeta extends Metadata> {
    readonly name: string;
    readonly size: number;

    has(id: string): boolean;
    get(id: string): CollectionRecord<TMeta> | undefined;
    getAll(): CollectionRecord<TMeta>[];
    /**
     * Embed items without adding them. Use with put to insert
     * several collections' records with no await in between
     */
    embed(items: CollectionItem<TMeta>[]): Promise<CollectionRecord<TMeta>[]>;
    put(records: CollectionRecord<TMeta>[]): void;
    add(items: CollectionItem<TMeta>[]): Promise<void>;
    clear(): void;
    /**
     * Return up to maxMatches records nearest to value, highest score first
     * @param value query text or a normalized embedding
     * @param maxMatches
     * @param filter (optional) only records whose metadata matches are scored
     * @param minScore (optional) no threshold by default
     */
    query(
        value: string | NormalizedEmbedding,
        maxMatches: number,
        filter?: MetadataFilter<TMeta>,
        minScore?: number,
    ): Promise<ScoredItem<CollectionRecord<TMeta>>[]>;
    nearest(
        value: string | NormalizedEmbedding,
        filter?: MetadataFilter<TMeta>,
    ): Promise<ScoredItem<CollectionRecord<TMeta>> | undefined>;
}

export function createSemanticCollection<TMeta extends Metadata>(
    name: string,
    model: TextEmbeddingModel,
    settings?: CollectionSettings,
    existingRecords?: CollectionRecord<TMeta>[],
): SemanticCollection<TMeta> {
    const collectionSettings = settings ?? {};
    const retry: EmbeddingRetrySettings = {
        retryMaxAttempts: collectionSettings.retryMaxAttempts ?? 0,
        retryPauseMs: collectionSettings.retryPauseMs ?? 1000,
    };
    const records = new Map<string, CollectionRecord<TMeta>>();
    if (existingRecords) {
        put(existingRecords);
    }

    return {
        name,
        get size() {
            return records.size;
        },
        has: (id) => records.has(id),
        get: (id) => records.get(id),
        getAll: () => [...records.values()],
        embed,
        put,
        add,
        clear: () => records.clear(),
        query,
        nearest,
    };

    async function embed(
        items: CollectionItem<TMeta>[],
    ): Promise<CollectionRecord<TMeta>[]> {
        if (items.length === 0) {
            return [];
        }
        const embeddings = await generateTextEmbeddings(
            model,
            items.map((item) => item.document),
            retry,
            collectionSettings.concurrency,
        );
        return items.map((item, i) => ({ ...item, embedding: embeddings[i] }));
    }

    function put(newRecords: CollectionRecord<TMeta>[]): void {
        for (const record of newRecords) {
            records.set(record.id, record);
        }
        debugCollection(`${name}: put ${newRecords.length}, size ${records.size}`);
    }

    async function add(items: CollectionItem<TMeta>[]): Promise<void> {
        put(await embed(items));
    }

    async function query(
        value: string | NormalizedEmbedding,
        maxMatches: number,
        filter?: MetadataFilter<TMeta>,
        minScore?: number,
    ): Promise<ScoredItem<CollectionRecord<TMeta>>[]> {
        if (records.size === 0 || maxMatches <= 0) {
            return [];
        }
        const embedding =
            typeof value === "string"
                ? await generateEmbedding(model, value, retry)
                : value;
        const threshold = minScore ?? Number.NEGATIVE_INFINITY;
        const matches = new TopNCollection<CollectionRecord<TMeta>>(
            maxMatches,
        );
        for (const record of records.values()) {
            if (filter && !isMatch(record.metadata, filter)) {
                continue;
            }
            const score = dotProduct(record.embedding, embedding);
            if (score >= threshold) {
                matches.push(record, score);
            }
        }
        debugCollection(`${name}: query matched ${matches.length}`);
        return matches.byRank();
    }

    async function nearest(
        value: string | NormalizedEmbedding,
        filter?: MetadataFilter<TMeta>,
    ): Promise<ScoredItem<CollectionRecord<TMeta>> | undefined> {
        const matches = await query(value, 1, filter);
        return matches.length > 0 ? matches[0] : undefined;
    }
}

function isMatch<TMeta extends Metadata>(
    metadata: TMeta,
    filter: MetadataFilter<TMeta>,
): boolean {
    for (const [key, expected] of Object.entries(filter)) {
        if (expected !== undefined && metadata[key] !== expected) {
            return false;
        }
    }
    return true;
}
