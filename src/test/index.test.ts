import { describe, expect, it } from 'vitest';

import { ArraySampleSource, collapseStacks, defaultCollapseOptions, formatFoldedStacks } from '../index';

describe("library entry point", () => {
    it("folds in-memory samples", () => {
        const source = new ArraySampleSource([
            { eventType: "cpu-clock", pid: 1, tid: 1, comm: "init", frames: [{ origin: "kernel", name: "do_idle" }, { origin: "native", name: "main" }] },
        ]);

        const { aggregator } = collapseStacks(source, { ...defaultCollapseOptions, annotateKernel: true, includePid: true });

        expect(formatFoldedStacks(aggregator)).toBe("init-1;main;do_idle_[k] 1\n");
    });
});
