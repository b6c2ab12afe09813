import type { Sample, SampleSource } from '../commonTypes';

/**
 * Sample source over samples already in memory.
 */
export class ArraySampleSource implements SampleSource {
    private consumed = false;

    constructor(private readonly records: readonly Sample[]) {}

    eventTypes(): string[] {
        return [...new Set(this.records.map((s) => s.eventType))];
    }

    samples(): Iterable<Sample> {
        if (this.consumed) {
            throw new Error("Samples can only be read once");
        }
        this.consumed = true;
        return this.records;
    }

    close(): void {
        // Nothing to release
    }
}
