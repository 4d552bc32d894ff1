// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { queue, QueueObject } from "async";
import registerDebug from "debug";

const debugSession = registerDebug("course-rag:session");

export type Exchange = {
    query: string;
    answer: string;
};

type SessionTask = () => Promise<void>;

/**
 * Per-session conversation history, keeping only the last maxHistory exchanges
 */
export class SessionManager {
    private sessions = new Map<string, Exchange[]>();
    private taskQueues = new Map<string, QueueObject<SessionTask>>();
    private sessionCounter = 0;

    constructor(public readonly maxHistory: number) {}

    /**
     * Create a new, empty session
     * @returns session id
     */
    public createSession(): string {
        this.sessionCounter++;
        const sessionId = `session_${this.sessionCounter}`;
        this.sessions.set(sessionId, []);
        debugSession(`Created ${sessionId}`);
        return sessionId;
    }

    public hasSession(sessionId: string): boolean {
        return this.sessions.has(sessionId);
    }

    /**
     * Append an exchange, dropping the oldest exchanges beyond maxHistory.
     * Unknown session ids start a new session
     */
    public addExchange(sessionId: string, query: string, answer: string): void {
        let history = this.sessions.get(sessionId);
        if (history === undefined) {
            history = [];
            this.sessions.set(sessionId, history);
        }
        history.push({ query, answer });
        while (history.length > this.maxHistory) {
            history.shift();
        }
    }

    public getExchanges(sessionId: string): Exchange[] {
        return [...(this.sessions.get(sessionId) ?? [])];
    }

    /**
     * Exchanges oldest first, as "User: ..." and "Assistant: ..." lines
     * @returns undefined if there are none
     */
    public getConversationHistory(sessionId: string): string | undefined {
        const history = this.sessions.get(sessionId);
        if (history === undefined || history.length === 0) {
            return undefined;
        }
        const lines: string[] = [];
        for (const exchange of history) {
            lines.push(`User: ${exchange.query}`);
            lines.push(`Assistant: ${exchange.answer}`);
        }
        return lines.join("\n");
    }

    public clearSession(sessionId: string): void {
        const history = this.sessions.get(sessionId);
        if (history) {
            history.length = 0;
        }
    }

    /**
     * Run fn after every earlier task of the same session has completed.
     * Tasks of different sessions are not ordered relative to each other.
     * A session's queue is dropped once it has no tasks left
     */
    public runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
        const taskQueue = this.getTaskQueue(sessionId);
        return new Promise<T>((resolve, reject) => {
            let result: T;
            const task: SessionTask = async () => {
                result = await fn();
            };
            taskQueue.push(task, (err) => {
                if (
                    taskQueue.idle() &&
                    this.taskQueues.get(sessionId) === taskQueue
                ) {
                    this.taskQueues.delete(sessionId);
                }
                if (err) {
                    reject(err);
                } else {
                    resolve(result);
                }
            });
        });
    }

    /**
     * True while a task of the session is running or waiting
     */
    public isBusy(sessionId: string): boolean {
        return this.taskQueues.has(sessionId);
    }

    private getTaskQueue(sessionId: string): QueueObject<SessionTask> {
        let taskQueue = this.taskQueues.get(sessionId);
        if (taskQueue === undefined) {
            taskQueue = queue<SessionTask>((task, callback) => {
                task().then(() => callback(), callback);
            }, 1);
            this.taskQueues.set(sessionId, taskQueue);
        }
        return taskQueue;
    }
}
