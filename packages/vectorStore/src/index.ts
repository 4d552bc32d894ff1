// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export * from "./common.js";

export * from "./vector/vector.js";
export * from "./vector/topN.js";
export * from "./vector/embeddingGenerator.js";
export * from "./vector/semanticCollection.js";

export * from "./storage/objStream.js";
export * from "./storage/collectionFile.js";
