// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import fs from "fs";
import path from "path";

/**
 * Read a JSON object from the given file.
 * @param filePath
 * @param validator converts the parsed JSON into T, or throws
 * @returns undefined if the file does not exist or is empty
 */
export async function readJsonFile<T>(
    filePath: string,
    validator: (obj: unknown) => T,
): Promise<T | undefined> {
    let json: string;
    try {
        json = await fs.promises.readFile(filePath, { encoding: "utf-8" });
    } catch (err) {
        if (isErrorCode(err, "ENOENT")) {
            return undefined;
        }
        throw err;
    }
    if (json.length === 0) {
        return undefined;
    }
    const obj: unknown = JSON.parse(json);
    return validator(obj);
}

let tempFileCount = 0;

/**
 * Write a json object to a file
 * The json is written to a temporary file of its own first, then renamed over filePath
 */
export async function writeJsonFile(
    filePath: string,
    value: unknown,
): Promise<void> {
    await ensureDir(path.dirname(filePath));
    const json = JSON.stringify(value);
    const tempPath = `${filePath}.${process.pid}.${++tempFileCount}.tmp`;
    await fs.promises.writeFile(tempPath, json);
    await fs.promises.rename(tempPath, filePath);
}

export async function ensureDir(folderPath: string): Promise<string> {
    if (!fs.existsSync(folderPath)) {
        await fs.promises.mkdir(folderPath, { recursive: true });
    }
    return folderPath;
}

export async function removeDir(folderPath: string): Promise<boolean> {
    try {
        await fs.promises.rm(folderPath, { recursive: true, force: true });
        return true;
    } catch (err) {
        if (isErrorCode(err, "ENOENT")) {
            return false;
        }
        throw err;
    }
}

function isErrorCode(err: unknown, code: string): boolean {
    return err instanceof Error && "code" in err && err.code === code;
}
