import type { IdentityMode, SampleSource } from '../commonTypes';
import { ConfigurationError } from '../errors';
import { logger } from '../logger';

import { StackAggregator } from './aggregator';
import { selectEventType } from './eventSelector';
import { normalizeFrame } from './frameNormalizer';
import type { FrameAnnotationOptions } from './frameNormalizer';
import { buildStackKey, identityPrefix } from './stackKey';

export interface CollapseOptions extends FrameAnnotationOptions {
    includePid: boolean,
    includeTid: boolean,
    // Prefix stacks with the thread name only. Ignored when pid or tid tagging is on.
    includeComm?: boolean,
    eventFilter?: string,
};

export interface CollapseResult {
    eventType: string | undefined,
    aggregator: StackAggregator,
    sampleCount: number,
};

export const defaultCollapseOptions: CollapseOptions = {
    annotateKernel: false,
    annotateJit: false,
    includeAddrs: false,
    includePid: false,
    includeTid: false,
};

export function validateCollapseOptions(options: CollapseOptions) {
    if (options.includePid && options.includeTid) {
        throw new ConfigurationError("--pid and --tid are mutually exclusive");
    }
}

export function identityModeOf(options: CollapseOptions): IdentityMode {
    if (options.includeTid) {
        return "tid";
    }
    if (options.includePid) {
        return "pid";
    }
    return options.includeComm ? "comm" : "none";
}

export function collapseStacks(source: SampleSource, options: CollapseOptions): CollapseResult {
    validateCollapseOptions(options);

    const identityMode = identityModeOf(options);
    const aggregator = new StackAggregator();
    const { eventType, samples } = selectEventType(source, options.eventFilter);

    let sampleCount = 0;
    for (const sample of samples) {
        const frames = sample.frames.map((frame) => normalizeFrame(frame, options));
        aggregator.record(buildStackKey(frames, identityPrefix(sample, identityMode)));
        sampleCount++;
    }

    logger.debug(`Folded ${sampleCount} samples into ${aggregator.size} stacks`);

    return { eventType, aggregator, sampleCount };
}
