// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export * from "./common.js";
export * from "./models.js";
export * as openai from "./openai.js";
export * from "./ollamaModels.js";
export * from "./restClient.js";
