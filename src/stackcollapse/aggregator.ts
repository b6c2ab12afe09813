// Unicode code point order, not UTF-16 code unit order.
export function compareCodePoints(a: string, b: string): number {
    let i = 0;
    while (i < a.length && i < b.length) {
        const left = a.codePointAt(i) ?? 0;
        const right = b.codePointAt(i) ?? 0;
        if (left !== right) {
            return left - right;
        }
        i += left > 0xffff ? 2 : 1;
    }
    return a.length - b.length;
}

export class StackAggregator {
    private counts = new Map<string, number>();
    private recorded = 0;

    record(stackKey: string) {
        this.counts.set(stackKey, (this.counts.get(stackKey) ?? 0) + 1);
        this.recorded++;
    }

    count(stackKey: string): number {
        return this.counts.get(stackKey) ?? 0;
    }

    get total(): number {
        return this.recorded;
    }

    get size(): number {
        return this.counts.size;
    }

    // Insertion order. Use `sortedEntries` for output.
    entries(): IterableIterator<[string, number]> {
        return this.counts.entries();
    }

    sortedEntries(): [string, number][] {
        return [...this.counts.entries()].sort(([a], [b]) => compareCodePoints(a, b));
    }
}
