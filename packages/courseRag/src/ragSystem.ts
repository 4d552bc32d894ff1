// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import fs from "fs";
import path from "path";
import registerDebug from "debug";
import { Result, success, error } from "typechat";
import { RagConfig, RagModels, validateRagConfig } from "./config.js";
import { CourseIndex, createCourseIndex } from "./courseIndex.js";
import { chunkCourse } from "./chunker.js";
import { parseCourseDocument } from "./documentParser.js";
import { Course, CourseChunk, Source } from "./models.js";
import { createCourseToolRegistry, ToolRegistry } from "./tools.js";
import { AnswerGenerator } from "./answerGenerator.js";
import { SessionManager } from "./sessionManager.js";

const debugIngest = registerDebug("course-rag:ingest");
const debugIngestError = registerDebug("course-rag:ingest:error");
const debugQuery = registerDebug("course-rag:query");

/**
 * Returns the text of a document file
 */
export type TextExtractor = (filePath: string) => Promise<string>;

export async function readTextFile(filePath: string): Promise<string> {
    return fs.promises.readFile(filePath, { encoding: "utf-8" });
}

export type ProcessedCourse = {
    course: Course;
    chunks: CourseChunk[];
};

export type AddCourseResult = ProcessedCourse & {
    // False if a course with this title was already ingested
    added: boolean;
};

export type FolderIngestResult = {
    // Courses and chunks added
    courseCount: number;
    chunkCount: number;
    // Files that could not be read or parsed
    failedFiles: string[];
};

export type QueryResponse = {
    answer: string;
    sources: Source[];
    sessionId: string;
};

export type CourseAnalytics = {
    totalCourses: number;
    totalChunks: number;
    courseTitles: string[];
};

/**
 * Everything needed to ingest course documents and answer questions about them
 */
export class RagSystem {
    public readonly index: CourseIndex;
    public readonly tools: ToolRegistry;
    public readonly answerGenerator: AnswerGenerator;
    public readonly sessions: SessionManager;
    private textExtractors = new Map<string, TextExtractor>();

    constructor(
        public readonly config: RagConfig,
        models: RagModels,
    ) {
        validateRagConfig(config);
        this.index = createCourseIndex(models.embeddingModel, {
            maxResults: config.maxResults,
            indexPath: config.indexPath,
        });
        this.tools = createCourseToolRegistry(this.index);
        this.answerGenerator = new AnswerGenerator(models.chatModel, this.tools);
        this.sessions = new SessionManager(config.maxHistory);
        this.registerTextExtractor(".txt", readTextFile);
    }

    /**
     * Load any saved index
     */
    public async initialize(): Promise<void> {
        await this.index.load();
    }

    /**
     * Handle documents with the given extension, such as ".pdf"
     */
    public registerTextExtractor(
        extension: string,
        extractor: TextExtractor,
    ): void {
        this.textExtractors.set(extension.toLowerCase(), extractor);
    }

    public canIngest(filePath: string): boolean {
        return this.textExtractors.has(path.extname(filePath).toLowerCase());
    }

    /**
     * Read, parse and chunk a course document
     */
    public async processCourseDocument(
        filePath: string,
    ): Promise<Result<ProcessedCourse>> {
        const extractor = this.textExtractors.get(
            path.extname(filePath).toLowerCase(),
        );
        if (extractor === undefined) {
            return error(`${filePath}: unsupported file type`);
        }
        let text: string;
        try {
            text = await extractor(filePath);
        } catch (e) {
            return error(
                `${filePath}: ${e instanceof Error ? e.message : String(e)}`,
            );
        }
        const parsed = parseCourseDocument(text);
        if (!parsed.success) {
            return error(`${filePath}: ${parsed.message}`);
        }
        return success({
            course: parsed.data.course,
            chunks: chunkCourse(parsed.data, this.config),
        });
    }

    /**
     * Ingest one course document. A course already in the index is not added again.
     * Fails if the index refuses the course's chunks
     */
    public async addCourseDocument(
        filePath: string,
    ): Promise<Result<AddCourseResult>> {
        const processed = await this.processCourseDocument(filePath);
        if (!processed.success) {
            return processed;
        }
        const { course, chunks } = processed.data;
        try {
            const added = await this.index.addCourse(course, chunks);
            return success({ course, chunks, added });
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            return error(`${filePath}: ${message}`);
        }
    }

    /**
     * Ingest every document in a folder that has a text extractor.
     * Documents that cannot be read or parsed are logged and skipped
     * @param folderPath
     * @param clearExisting remove all indexed courses first
     */
    public async addCourseFolder(
        folderPath: string,
        clearExisting: boolean = false,
    ): Promise<FolderIngestResult> {
        if (clearExisting) {
            debugIngest("Clearing existing data");
            await this.index.clearAllData();
        }
        const result: FolderIngestResult = {
            courseCount: 0,
            chunkCount: 0,
            failedFiles: [],
        };
        const fileNames = (await fs.promises.readdir(folderPath)).sort();
        for (const fileName of fileNames) {
            const filePath = path.join(folderPath, fileName);
            if (!this.canIngest(filePath)) {
                continue;
            }
            const added = await this.addCourseDocument(filePath);
            if (!added.success) {
                debugIngestError(added.message);
                result.failedFiles.push(filePath);
                continue;
            }
            if (added.data.added) {
                result.courseCount++;
                result.chunkCount += added.data.chunks.length;
                debugIngest(
                    `Added ${added.data.course.title}: ${added.data.chunks.length} chunks`,
                );
            } else {
                debugIngest(`Skipped existing ${added.data.course.title}`);
            }
        }
        return result;
    }

    /**
     * Answer a question, remembering the exchange in the session.
     * Creates a session if no id is given
     */
    public async query(
        query: string,
        sessionId?: string,
    ): Promise<QueryResponse> {
        const id = sessionId ?? this.sessions.createSession();
        return this.sessions.runExclusive(id, async () => {
            debugQuery(`${id}: ${query}`);
            const history = this.sessions.getConversationHistory(id);
            const { answer, sources } =
                await this.answerGenerator.generateAnswer(query, history);
            this.sessions.addExchange(id, query, answer);
            return { answer, sources, sessionId: id };
        });
    }

    public getCourseAnalytics(): CourseAnalytics {
        return {
            totalCourses: this.index.getCourseCount(),
            totalChunks: this.index.getChunkCount(),
            courseTitles: this.index.getExistingCourseTitles(),
        };
    }
}

/**
 * Create a RAG system and load its saved index
 */
export async function createRagSystem(
    config: RagConfig,
    models: RagModels,
): Promise<RagSystem> {
    const ragSystem = new RagSystem(config, models);
    await ragSystem.initialize();
    return ragSystem;
}
