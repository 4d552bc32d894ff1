// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { SessionManager } from "../src/sessionManager.js";

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("sessionManager", () => {
    test("createSession", () => {
        const sessions = new SessionManager(2);
        expect(sessions.createSession()).toBe("session_1");
        expect(sessions.createSession()).toBe("session_2");
        expect(sessions.hasSession("session_2")).toBe(true);
        expect(sessions.hasSession("session_3")).toBe(false);
        expect(sessions.getConversationHistory("session_1")).toBeUndefined();
    });
    test("historyIsBounded", () => {
        const sessions = new SessionManager(2);
        const id = sessions.createSession();
        sessions.addExchange(id, "q1", "a1");
        sessions.addExchange(id, "q2", "a2");
        sessions.addExchange(id, "q3", "a3");
        expect(sessions.getExchanges(id)).toEqual([
            { query: "q2", answer: "a2" },
            { query: "q3", answer: "a3" },
        ]);
        expect(sessions.getConversationHistory(id)).toBe(
            "User: q2\nAssistant: a2\nUser: q3\nAssistant: a3",
        );
    });
    test("noHistory", () => {
        const sessions = new SessionManager(0);
        const id = sessions.createSession();
        sessions.addExchange(id, "q1", "a1");
        expect(sessions.getConversationHistory(id)).toBeUndefined();
    });
    test("unknownSession", () => {
        const sessions = new SessionManager(2);
        sessions.addExchange("custom", "q", "a");
        expect(sessions.hasSession("custom")).toBe(true);
        expect(sessions.getConversationHistory("custom")).toBe(
            "User: q\nAssistant: a",
        );
        sessions.clearSession("custom");
        expect(sessions.getExchanges("custom")).toEqual([]);
        expect(sessions.getExchanges("never")).toEqual([]);
    });
    test("runExclusiveOrdersTasks", async () => {
        const sessions = new SessionManager(2);
        const events: string[] = [];
        const first = sessions.runExclusive("s", async () => {
            events.push("first:start");
            await delay(20);
            events.push("first:end");
            return 1;
        });
        const second = sessions.runExclusive("s", async () => {
            events.push("second:start");
            return 2;
        });
        expect(await Promise.all([first, second])).toEqual([1, 2]);
        expect(events).toEqual(["first:start", "first:end", "second:start"]);
    });
    test("runExclusivePropagatesErrors", async () => {
        const sessions = new SessionManager(2);
        const failed = sessions.runExclusive("s", async () => {
            throw new Error("failed");
        });
        const next = sessions.runExclusive("s", async () => "next");
        await expect(failed).rejects.toThrow("failed");
        expect(await next).toBe("next");
    });
    test("idleSessionQueueIsDropped", async () => {
        const sessions = new SessionManager(2);
        expect(sessions.isBusy("s")).toBe(false);
        const first = sessions.runExclusive("s", async () => {
            await delay(20);
            return "first";
        });
        const second = sessions.runExclusive("s", async () => {
            await delay(20);
            return "second";
        });
        expect(sessions.isBusy("s")).toBe(true);
        expect(await first).toBe("first");
        // The second task is still queued
        expect(sessions.isBusy("s")).toBe(true);
        expect(await second).toBe("second");
        expect(sessions.isBusy("s")).toBe(false);

        await expect(
            sessions.runExclusive("s", async () => {
                throw new Error("failed");
            }),
        ).rejects.toThrow("failed");
        expect(sessions.isBusy("s")).toBe(false);
        expect(await sessions.runExclusive("s", async () => 3)).toBe(3);
    });
    test("sessionsRunIndependently", async () => {
        const sessions = new SessionManager(2);
        const events: string[] = [];
        const slow = sessions.runExclusive("a", async () => {
            await delay(20);
            events.push("a");
        });
        const fast = sessions.runExclusive("b", async () => {
            events.push("b");
        });
        await Promise.all([slow, fast]);
        expect(events).toEqual(["b", "a"]);
    });
});
