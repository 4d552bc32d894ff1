// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import dotenv from "dotenv";
import readline from "readline/promises";
import {
    createModelsFromEnv,
    createRagSystem,
    ragConfigFromEnv,
} from "course-rag";
import { ChatPrinter } from "./chatPrinter.js";
import { addFolder, commandHelp, runCommand } from "./commands.js";
import { getEnvPath } from "./envPath.js";

const envPath = getEnvPath(__dirname);
if (envPath) {
    dotenv.config({ path: envPath });
}

async function runCourseChat(): Promise<void> {
    const printer = new ChatPrinter();
    const ragSystem = await createRagSystem(
        ragConfigFromEnv(),
        createModelsFromEnv(),
    );
    const folderPath = process.argv[2];
    if (folderPath) {
        await addFolder(ragSystem, printer, folderPath);
    }
    printer.writeAnalytics(ragSystem.getCourseAnalytics());
    printer.writeLine(commandHelp);

    const line = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
    });
    let sessionId: string | undefined;
    try {
        while (true) {
            const input = (await line.question("🎓> ")).trim();
            if (!input) {
                continue;
            }
            if (input === "@exit" || input === "quit") {
                break;
            }
            if (input.startsWith("@")) {
                sessionId = await runCommand(
                    ragSystem,
                    printer,
                    input,
                    sessionId,
                );
                continue;
            }
            try {
                const response = await ragSystem.query(input, sessionId);
                sessionId = response.sessionId;
                printer.writeAnswer(response.answer);
                printer.writeSources(response.sources);
            } catch (e) {
                printer.writeError(e instanceof Error ? e.message : String(e));
            }
        }
    } finally {
        line.close();
    }
}

runCourseChat().catch((e) => {
    console.error(e);
    process.exitCode = 1;
});
