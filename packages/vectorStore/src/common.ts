// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export type ScoredItem<T = number> = {
    item: T;
    score: number;
};
