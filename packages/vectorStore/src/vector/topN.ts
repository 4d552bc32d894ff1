// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { ScoredItem } from "../common.js";

/**
 * Keeps the maxCount highest-scoring items seen so far.
 * A min-heap: the weakest kept item is at the root and is the first evicted
 */
export class TopNCollection<T> {
    private heap: ScoredItem<T>[] = [];

    constructor(public readonly maxCount: number) {}

    public get length(): number {
        return this.heap.length;
    }

    public push(item: T, score: number): void {
        if (this.maxCount <= 0) {
            return;
        }
        if (this.heap.length < this.maxCount) {
            this.heap.push({ item, score });
            this.siftUp(this.heap.length - 1);
        } else if (score > this.heap[0].score) {
            this.heap[0] = { item, score };
            this.siftDown(0);
        }
    }

    /**
     * Items, highest score first. Empties the collection
     */
    public byRank(): ScoredItem<T>[] {
        const ranked: ScoredItem<T>[] = [];
        while (this.heap.length > 0) {
            ranked.push(this.popMin());
        }
        return ranked.reverse();
    }

    private popMin(): ScoredItem<T> {
        const min = this.heap[0];
        const last = this.heap.pop();
        if (last !== undefined && this.heap.length > 0) {
            this.heap[0] = last;
            this.siftDown(0);
        }
        return min;
    }

    private siftUp(index: number): void {
        while (index > 0) {
            const parent = (index - 1) >> 1;
            if (this.heap[parent].score <= this.heap[index].score) {
                break;
            }
            this.swap(parent, index);
            index = parent;
        }
    }

    private siftDown(index: number): void {
        const count = this.heap.length;
        while (true) {
            let smallest = index;
            for (const child of [2 * index + 1, 2 * index + 2]) {
                if (
                    child < count &&
                    this.heap[child].score < this.heap[smallest].score
                ) {
                    smallest = child;
                }
            }
            if (smallest === index) {
                return;
            }
            this.swap(smallest, index);
            index = smallest;
        }
    }

    private swap(i: number, j: number): void {
        [this.heap[i], this.heap[j]] = [this.heap[j], this.heap[i]];
    }
}
