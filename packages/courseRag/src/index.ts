// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export * from "./models.js";
export * from "./config.js";
export * from "./textChunker.js";
export * from "./chunker.js";
export * from "./documentParser.js";
export * from "./courseIndex.js";
export * from "./tools.js";
export * from "./answerGenerator.js";
export * from "./sessionManager.js";
export * from "./ragSystem.js";
