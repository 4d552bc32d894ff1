// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import path from "path";
import registerDebug from "debug";
import {
    CollectionRecord,
    Metadata,
    SemanticCollection,
} from "../vector/semanticCollection.js";
import { readJsonFile, writeJsonFile } from "./objStream.js";

const debugStorage = registerDebug("vector-store:storage");

/**
 * On-disk form of a collection: embeddings are stored as plain number arrays
 */
export type CollectionData = {
    name: string;
    records: {
        id: string;
        document: string;
        metadata: Metadata;
        embedding: number[];
    }[];
};

export function getCollectionFilePath(
    folderPath: string,
    collectionName: string,
): string {
    return path.join(folderPath, `${collectionName}.json`);
}

/**
 * Save all records of the collection to {folderPath}/{collection name}.json
 */
export async function saveCollection<TMeta extends Metadata>(
    collection: SemanticCollection<TMeta>,
    folderPath: string,
): Promise<void> {
    const data: CollectionData = {
        name: collection.name,
        records: collection.getAll().map((r) => ({
            id: r.id,
            document: r.document,
            metadata: r.metadata,
            embedding: Array.from(r.embedding),
        })),
    };
    const filePath = getCollectionFilePath(folderPath, collection.name);
    await writeJsonFile(filePath, data);
    debugStorage(`Saved ${data.records.length} records to ${filePath}`);
}

/**
 * Load the records of a collection saved with saveCollection
 * @param isMetadata verifies each record's metadata
 * @returns undefined if nothing was saved
 */
export async function loadCollectionRecords<TMeta extends Metadata>(
    folderPath: string,
    collectionName: string,
    isMetadata: (value: unknown) => value is TMeta,
): Promise<CollectionRecord<TMeta>[] | undefined> {
    const filePath = getCollectionFilePath(folderPath, collectionName);
    const records = await readJsonFile(filePath, (obj) =>
        toRecords(obj, isMetadata, filePath),
    );
    if (records) {
        debugStorage(`Loaded ${records.length} records from ${filePath}`);
    }
    return records;
}

function toRecords<TMeta extends Metadata>(
    obj: unknown,
    isMetadata: (value: unknown) => value is TMeta,
    filePath: string,
): CollectionRecord<TMeta>[] {
    if (
        typeof obj !== "object" ||
        obj === null ||
        !("records" in obj) ||
        !Array.isArray(obj.records)
    ) {
        throw new Error(`${filePath}: not a collection file`);
    }
    const records: CollectionRecord<TMeta>[] = [];
    for (const value of obj.records) {
        if (
            typeof value !== "object" ||
            value === null ||
            !("id" in value) ||
            typeof value.id !== "string" ||
            !("document" in value) ||
            typeof value.document !== "string" ||
            !("metadata" in value) ||
            !isMetadata(value.metadata) ||
            !("embedding" in value) ||
            !isNumberArray(value.embedding)
        ) {
            throw new Error(`${filePath}: invalid record`);
        }
        records.push({
            id: value.id,
            document: value.document,
            metadata: value.metadata,
            embedding: new Float32Array(value.embedding),
        });
    }
    return records;
}

function isNumberArray(value: unknown): value is number[] {
    return Array.isArray(value) && value.every((v) => typeof v === "number");
}
