// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import fs from "fs";
import path from "path";

/**
 * The .env file at the root of the workspace holding startDir.
 * The root is the nearest folder whose package.json declares workspaces;
 * it is the same whether the code runs from its sources or from dist
 */
export function getEnvPath(startDir: string): string | undefined {
    let dir = path.resolve(startDir);
    while (true) {
        if (isWorkspaceRoot(dir)) {
            return path.join(dir, ".env");
        }
        const parent = path.dirname(dir);
        if (parent === dir) {
            return undefined;
        }
        dir = parent;
    }
}

function isWorkspaceRoot(dir: string): boolean {
    const packagePath = path.join(dir, "package.json");
    if (!fs.existsSync(packagePath)) {
        return false;
    }
    const packageJson: unknown = JSON.parse(
        fs.readFileSync(packagePath, "utf-8"),
    );
    return (
        typeof packageJson === "object" &&
        packageJson !== null &&
        "workspaces" in packageJson
    );
}
