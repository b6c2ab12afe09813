import type { IdentityMode, Sample } from '../commonTypes';

export const stackSeparator = ";";
export const unknownFrame = "[unknown]";

export function identityPrefix(sample: Sample, mode: IdentityMode): string | undefined {
    switch (mode) {
        case "none":
            return undefined;
        case "comm":
            return sample.comm;
        case "pid":
            return `${sample.comm}-${sample.pid}`;
        case "tid":
            return `${sample.comm}-${sample.pid}/${sample.tid}`;
    }
}

/**
 * Turns leaf-first frame names into the root-first key samples are grouped by.
 * A sample without frames is keyed under a single `[unknown]` frame so it is
 * still counted.
 */
export function buildStackKey(leafFirstFrames: readonly string[], prefix?: string): string {
    const rootFirst = leafFirstFrames.length ? [...leafFirstFrames].reverse() : [unknownFrame];
    if (prefix !== undefined) {
        rootFirst.unshift(prefix);
    }
    return rootFirst.join(stackSeparator);
}
