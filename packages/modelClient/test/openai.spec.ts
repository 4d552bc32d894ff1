// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    createChatModel,
    createEmbeddingModel,
    parseToolArguments,
} from "../src/openai.js";
import { ModelType, OpenAIApiSettings } from "../src/openaiSettings.js";
import { ToolDefinition } from "../src/models.js";

function testSettings(modelType: ModelType): OpenAIApiSettings {
    return {
        provider: "openai",
        modelType,
        apiKey: "test-key",
        endpoint: "http://localhost/v1/test",
        modelName: "test-model",
        maxRetryAttempts: 0,
    };
}

function jsonResponse(body: object): Response {
    return new Response(JSON.stringify(body), {
        status: 200,
        headers: { "content-type": "application/json" },
    });
}

const searchTool: ToolDefinition = {
    name: "search_course_content",
    description: "Search course materials",
    parameters: {
        type: "object",
        properties: {
            query: { type: "string", description: "What to search for" },
        },
        required: ["query"],
    },
};

describe("openai.chat", () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    test("directAnswer", async () => {
        jest.spyOn(globalThis, "fetch").mockResolvedValue(
            jsonResponse({
                id: "1",
                choices: [{ message: { role: "assistant", content: "Hello" } }],
            }),
        );
        const model = createChatModel(testSettings(ModelType.Chat));
        const result = await model.completeWithTools("You are helpful", [
            { role: "user", content: "Hi" },
        ]);
        expect(result).toEqual({
            success: true,
            data: { type: "answer", text: "Hello" },
        });
    });
    test("requestBody", async () => {
        const fetchSpy = jest
            .spyOn(globalThis, "fetch")
            .mockResolvedValue(
                jsonResponse({
                    id: "1",
                    choices: [{ message: { role: "assistant", content: "" } }],
                }),
            );
        const model = createChatModel(testSettings(ModelType.Chat));
        await model.completeWithTools(
            "system text",
            [
                { role: "user", content: "What is in lesson 1?" },
                {
                    role: "assistant",
                    content: "",
                    toolCalls: [
                        {
                            id: "call_1",
                            name: "search_course_content",
                            arguments: { query: "lesson 1" },
                        },
                    ],
                },
                { role: "tool", toolCallId: "call_1", content: "passages" },
            ],
            [searchTool],
        );
        const init = fetchSpy.mock.calls[0][1];
        const body = JSON.parse(String(init?.body));
        expect(body.model).toEqual("test-model");
        expect(body.temperature).toEqual(0);
        expect(body.tool_choice).toEqual("auto");
        expect(body.tools).toEqual([
            {
                type: "function",
                function: {
                    name: searchTool.name,
                    description: searchTool.description,
                    parameters: searchTool.parameters,
                },
            },
        ]);
        expect(body.messages).toEqual([
            { role: "system", content: "system text" },
            { role: "user", content: "What is in lesson 1?" },
            {
                role: "assistant",
                content: null,
                tool_calls: [
                    {
                        id: "call_1",
                        type: "function",
                        function: {
                            name: "search_course_content",
                            arguments: '{"query":"lesson 1"}',
                        },
                    },
                ],
            },
            { role: "tool", tool_call_id: "call_1", content: "passages" },
        ]);
    });
    test("noToolsMeansNoToolChoice", async () => {
        const fetchSpy = jest
            .spyOn(globalThis, "fetch")
            .mockResolvedValue(
                jsonResponse({
                    id: "1",
                    choices: [{ message: { role: "assistant", content: "ok" } }],
                }),
            );
        const model = createChatModel(testSettings(ModelType.Chat));
        await model.completeWithTools("system", [
            { role: "user", content: "Hi" },
        ]);
        const body = JSON.parse(String(fetchSpy.mock.calls[0][1]?.body));
        expect(body.tools).toBeUndefined();
        expect(body.tool_choice).toBeUndefined();
    });
    test("toolUse", async () => {
        jest.spyOn(globalThis, "fetch").mockResolvedValue(
            jsonResponse({
                id: "2",
                choices: [
                    {
                        finish_reason: "tool_calls",
                        message: {
                            role: "assistant",
                            content: null,
                            tool_calls: [
                                {
                                    id: "call_7",
                                    type: "function",
                                    function: {
                                        name: "search_course_content",
                                        arguments:
                                            '{"query":"vectors","lesson_number":1}',
                                    },
                                },
                            ],
                        },
                    },
                ],
            }),
        );
        const model = createChatModel(testSettings(ModelType.Chat));
        const result = await model.completeWithTools(
            "system",
            [{ role: "user", content: "Tell me about vectors" }],
            [searchTool],
        );
        expect(result).toEqual({
            success: true,
            data: {
                type: "toolUse",
                text: "",
                toolCalls: [
                    {
                        id: "call_7",
                        name: "search_course_content",
                        arguments: { query: "vectors", lesson_number: 1 },
                    },
                ],
            },
        });
    });
    test("emptyChoices", async () => {
        jest.spyOn(globalThis, "fetch").mockResolvedValue(
            jsonResponse({ id: "3", choices: [] }),
        );
        const model = createChatModel(testSettings(ModelType.Chat));
        const result = await model.completeWithTools("system", []);
        expect(result).toEqual({
            success: false,
            message: "No choices returned",
        });
    });
});

describe("openai.toolArguments", () => {
    test("parse", () => {
        expect(parseToolArguments('{"query":"x"}')).toEqual({
            success: true,
            data: { query: "x" },
        });
        expect(parseToolArguments("")).toEqual({ success: true, data: {} });
        expect(parseToolArguments("[1]").success).toBe(false);
        expect(parseToolArguments("{not json").success).toBe(false);
    });
});

describe("openai.embeddings", () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    test("generateBatch", async () => {
        jest.spyOn(globalThis, "fetch").mockResolvedValue(
            jsonResponse({
                data: [{ embedding: [1, 0] }, { embedding: [0, 1] }],
            }),
        );
        const model = createEmbeddingModel(testSettings(ModelType.Embedding));
        expect(model.generateEmbeddingBatch).toBeDefined();
        if (model.generateEmbeddingBatch) {
            const result = await model.generateEmbeddingBatch(["a", "b"]);
            expect(result).toEqual({
                success: true,
                data: [
                    [1, 0],
                    [0, 1],
                ],
            });
        }
    });
    test("emptyInput", async () => {
        const model = createEmbeddingModel(testSettings(ModelType.Embedding));
        const result = await model.generateEmbedding("");
        expect(result).toEqual({ success: false, message: "Empty input" });
    });
});
