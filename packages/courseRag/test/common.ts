// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import fs from "fs";
import path from "path";
import { TextEmbeddingModel } from "model-client";
import { getData } from "typechat";
import { VocabularyEmbeddingModel } from "test-support";
import { chunkCourse } from "../src/chunker.js";
import { DefaultRagConfig } from "../src/config.js";
import { CourseIndex, createCourseIndex } from "../src/courseIndex.js";
import { parseCourseDocument } from "../src/documentParser.js";
import { CourseChunk, CourseDocument } from "../src/models.js";

export const testDataPath = path.join(__dirname, "data");

export const LinearAlgebraTitle = "Linear Algebra for Machine Learning";
export const ComputerUseTitle = "Building Toward Computer Use with Anthropic";
export const ProtocolTitle = "Model Context Protocol Basics";

export const testCourseFiles = [
    "course1_linear_algebra.txt",
    "course2_computer_use.txt",
    "course3_protocol.txt",
];

export function loadTestDocument(fileName: string): CourseDocument {
    const text = fs.readFileSync(path.join(testDataPath, fileName), "utf-8");
    return getData(parseCourseDocument(text));
}

export function loadTestChunks(document: CourseDocument): CourseChunk[] {
    return chunkCourse(document, DefaultRagConfig);
}

export function createTestIndex(
    indexPath?: string,
    model: TextEmbeddingModel = new VocabularyEmbeddingModel(),
): CourseIndex {
    return createCourseIndex(model, {
        maxResults: DefaultRagConfig.maxResults,
        indexPath,
    });
}

/**
 * Index holding the given test course files
 */
export async function createTestIndexWith(
    fileNames: string[],
    indexPath?: string,
    model?: TextEmbeddingModel,
): Promise<CourseIndex> {
    const index = createTestIndex(indexPath, model);
    for (const fileName of fileNames) {
        const document = loadTestDocument(fileName);
        await index.addCourse(document.course, loadTestChunks(document));
    }
    return index;
}
