import type { StackAggregator } from './aggregator';

export function formatFoldedStacks(aggregator: StackAggregator): string {
    return aggregator.sortedEntries()
        .map(([stackKey, count]) => `${stackKey} ${count}\n`)
        .join("");
}

export async function writeFoldedStacks(aggregator: StackAggregator, output: NodeJS.WritableStream): Promise<void> {
    const text = formatFoldedStacks(aggregator);
    if (!text) {
        return;
    }

    await new Promise<void>((resolve, reject) => {
        // A closed pipe (EPIPE) is reported as an 'error' event, not only to the write callback.
        output.once("error", reject);
        output.write(text, (err?: Error | null) => {
            if (err) {
                reject(err);
            } else {
                output.removeListener("error", reject);
                resolve();
            }
        });
    });
}
