// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import os from "os";
import path from "path";

export function testDirectoryPath(subPath: string): string {
    return path.join(os.tmpdir(), "course-rag-test", subPath);
}
