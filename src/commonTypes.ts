export type FrameOrigin = "native" | "kernel" | "jit";

export interface ResolvedFrame {
    origin: FrameOrigin,
    name: string,
};

export interface UnresolvedFrame {
    origin: FrameOrigin,
    address: bigint,
    // Path of the binary the address belongs to, when known.
    dsoPath?: string,
};

export type Frame = ResolvedFrame | UnresolvedFrame;

export interface Sample {
    eventType: string,
    pid: number,
    tid: number,
    comm: string,
    // Innermost call first.
    frames: Frame[],
    isOffCpu?: boolean,
    time?: bigint,
};

export type IdentityMode = "none" | "comm" | "pid" | "tid";

/**
 * A decoded profiling session. `samples()` may only be iterated once.
 */
export interface SampleSource {
    eventTypes(): string[];
    samples(): Iterable<Sample>;
    close(): void;
}

export function isResolvedFrame(frame: Frame): frame is ResolvedFrame {
    return "name" in frame;
}
