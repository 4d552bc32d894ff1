// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { answerResponse, ScriptedChatModel, toolUseResponse } from "test-support";
import { error } from "typechat";
import {
    AnswerGenerationError,
    AnswerGenerator,
    SystemPrompt,
} from "../src/answerGenerator.js";
import {
    createCourseToolRegistry,
    OutlineToolName,
    SearchToolName,
    ToolRegistry,
} from "../src/tools.js";
import {
    ComputerUseTitle,
    createTestIndexWith,
    LinearAlgebraTitle,
    testCourseFiles,
} from "./common.js";

const searchCall = {
    id: "call_1",
    name: SearchToolName,
    arguments: {
        query: "matrix multiplication",
        course_name: "linear algebra",
        lesson_number: 1,
    },
};

const outlineCall = {
    id: "call_2",
    name: OutlineToolName,
    arguments: { course_name: "Anthropic" },
};

const lessonSource = {
    label: "Linear Algebra for Machine Learning - Lesson 1",
    courseTitle: LinearAlgebraTitle,
    lessonNumber: 1,
    link: "https://example.com/linear-algebra/lesson-1",
};

describe("answerGenerator", () => {
    let tools: ToolRegistry;
    beforeAll(async () => {
        tools = createCourseToolRegistry(
            await createTestIndexWith(testCourseFiles),
        );
    });

    test("directAnswer", async () => {
        const model = new ScriptedChatModel([
            answerResponse("A vector is an ordered list of numbers."),
        ]);
        const generator = new AnswerGenerator(model, tools);
        const result = await generator.generateAnswer("What is a vector?");
        expect(result).toEqual({
            answer: "A vector is an ordered list of numbers.",
            sources: [],
        });
        expect(model.calls).toHaveLength(1);
        const call = model.calls[0];
        expect(call.systemContext).toBe(SystemPrompt);
        expect(call.turns).toEqual([
            {
                role: "user",
                content:
                    "Answer this question about course materials: What is a vector?",
            },
        ]);
        expect(call.tools?.map((t) => t.name)).toEqual([
            SearchToolName,
            OutlineToolName,
        ]);
    });
    test("toolRound", async () => {
        const model = new ScriptedChatModel([
            toolUseResponse([searchCall]),
            answerResponse("Rows are combined with columns."),
        ]);
        const generator = new AnswerGenerator(model, tools);
        const result = await generator.generateAnswer(
            "How does matrix multiplication work?",
        );
        expect(result).toEqual({
            answer: "Rows are combined with columns.",
            sources: [lessonSource],
        });
        expect(model.calls).toHaveLength(2);
        const second = model.calls[1];
        // No tools: the second response is final
        expect(second.tools).toBeUndefined();
        expect(second.turns).toHaveLength(3);
        expect(second.turns[1]).toEqual({
            role: "assistant",
            content: "",
            toolCalls: [searchCall],
        });
        const toolTurn = second.turns[2];
        expect(toolTurn.role).toBe("tool");
        if (toolTurn.role === "tool") {
            expect(toolTurn.toolCallId).toBe("call_1");
            expect(
                toolTurn.content.startsWith(
                    "[Linear Algebra for Machine Learning - Lesson 1]\n",
                ),
            ).toBe(true);
        }
    });
    test("multipleToolCalls", async () => {
        const model = new ScriptedChatModel([
            toolUseResponse([searchCall, outlineCall]),
            answerResponse("done"),
        ]);
        const generator = new AnswerGenerator(model, tools);
        const result = await generator.generateAnswer("Tell me everything");
        expect(result.sources).toEqual([
            lessonSource,
            {
                label: ComputerUseTitle,
                courseTitle: ComputerUseTitle,
                link: "https://example.com/computer-use",
            },
        ]);
        const turns = model.calls[1].turns;
        expect(turns).toHaveLength(4);
        expect(
            turns.map((t) => (t.role === "tool" ? t.toolCallId : t.role)),
        ).toEqual(["user", "assistant", "call_1", "call_2"]);
    });
    test("unknownToolCall", async () => {
        const model = new ScriptedChatModel([
            toolUseResponse([{ id: "call_9", name: "missing", arguments: {} }]),
            answerResponse("I could not look that up."),
        ]);
        const generator = new AnswerGenerator(model, tools);
        const result = await generator.generateAnswer("q");
        expect(result).toEqual({
            answer: "I could not look that up.",
            sources: [],
        });
        expect(model.calls[1].turns[2]).toEqual({
            role: "tool",
            toolCallId: "call_9",
            content: "Tool 'missing' not found",
        });
    });
    test("history", async () => {
        const model = new ScriptedChatModel([answerResponse("ok")]);
        const generator = new AnswerGenerator(model, tools);
        await generator.generateAnswer("q", "User: a\nAssistant: b");
        expect(model.calls[0].systemContext).toBe(
            `${SystemPrompt}\n\nPrevious conversation:\nUser: a\nAssistant: b`,
        );
    });
    test("secondToolRequestIsIgnored", async () => {
        const model = new ScriptedChatModel([
            toolUseResponse([searchCall]),
            toolUseResponse([outlineCall], "Partial answer"),
            answerResponse("never used"),
        ]);
        const generator = new AnswerGenerator(model, tools);
        const result = await generator.generateAnswer("q");
        expect(result.answer).toBe("Partial answer");
        expect(result.sources).toEqual([lessonSource]);
        expect(model.calls).toHaveLength(2);
    });
    test("firstCallFails", async () => {
        const model = new ScriptedChatModel([error("rate limited")]);
        const generator = new AnswerGenerator(model, tools);
        const answer = generator.generateAnswer("q");
        await expect(answer).rejects.toThrow(AnswerGenerationError);
        await expect(answer).rejects.toMatchObject({
            message: "rate limited",
            state: "awaitingFirstResponse",
        });
        expect(model.calls).toHaveLength(1);
    });
    test("secondCallFails", async () => {
        const model = new ScriptedChatModel([
            toolUseResponse([searchCall]),
            error("timeout"),
        ]);
        const generator = new AnswerGenerator(model, tools);
        await expect(generator.generateAnswer("q")).rejects.toMatchObject({
            name: "AnswerGenerationError",
            state: "awaitingSecondResponse",
        });
    });
});
