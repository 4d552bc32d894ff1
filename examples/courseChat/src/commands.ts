// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { RagSystem } from "course-rag";
import { ChatPrinter } from "./chatPrinter.js";

export const commandHelp = [
    "@courses   list indexed courses",
    "@add <folder> [--clear]   ingest a folder of course documents",
    "@new   start a new conversation",
    "@exit   quit",
].join("\n");

/**
 * Run an @ command. Failures are printed; the chat goes on
 * @returns the session id to use for the next question
 */
export async function runCommand(
    ragSystem: RagSystem,
    printer: ChatPrinter,
    input: string,
    sessionId: string | undefined,
): Promise<string | undefined> {
    const [command, ...args] = input.split(/\s+/);
    try {
        switch (command) {
            default:
                printer.writeError(`Unknown command ${command}`);
                printer.writeLine(commandHelp);
                break;
            case "@courses":
                printer.writeAnalytics(ragSystem.getCourseAnalytics());
                break;
            case "@add": {
                const folder = args.find((a) => !a.startsWith("--"));
                if (!folder) {
                    printer.writeError("Usage: @add <folder> [--clear]");
                    break;
                }
                await addFolder(
                    ragSystem,
                    printer,
                    folder,
                    args.includes("--clear"),
                );
                break;
            }
            case "@new":
                if (sessionId) {
                    ragSystem.sessions.clearSession(sessionId);
                }
                return undefined;
        }
    } catch (e) {
        printer.writeError(e instanceof Error ? e.message : String(e));
    }
    return sessionId;
}

export async function addFolder(
    ragSystem: RagSystem,
    printer: ChatPrinter,
    folderPath: string,
    clearExisting: boolean = false,
): Promise<void> {
    try {
        printer.writeIngestResult(
            await ragSystem.addCourseFolder(folderPath, clearExisting),
        );
    } catch (e) {
        printer.writeError(
            `Could not ingest ${folderPath}: ${e instanceof Error ? e.message : String(e)}`,
        );
    }
}
