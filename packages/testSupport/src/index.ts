// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export * from "./models.js";
export * from "./test.js";
