import * as path from 'path';

import { isResolvedFrame } from '../commonTypes';
import type { Frame } from '../commonTypes';

export interface FrameAnnotationOptions {
    annotateKernel: boolean,
    annotateJit: boolean,
    includeAddrs: boolean,
};

export const kernelSuffix = "_[k]";
export const jitSuffix = "_[j]";
export const unknownSymbol = "unknown";

function formatAddress(address: bigint, dsoPath?: string): string {
    const dsoName = dsoPath ? path.posix.basename(dsoPath) : "";
    return `${dsoName}[+${address.toString(16)}]`;
}

export function normalizeFrame(frame: Frame, options: FrameAnnotationOptions): string {
    let name: string;
    if (isResolvedFrame(frame)) {
        name = frame.name;
    } else if (options.includeAddrs) {
        name = formatAddress(frame.address, frame.dsoPath);
    } else {
        name = unknownSymbol;
    }

    if (frame.origin === "kernel" && options.annotateKernel) {
        return name + kernelSuffix;
    }
    if (frame.origin === "jit" && options.annotateJit) {
        return name + jitSuffix;
    }
    return name;
}
