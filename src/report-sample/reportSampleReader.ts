import * as path from 'path';
import * as fsPromises from 'fs/promises';
import * as protobuf from 'protobufjs';

import type { Frame, FrameOrigin, Sample, SampleSource } from '../commonTypes';
import { MalformedSessionError, SessionNotFoundError } from '../errors';
import { logger } from '../logger';

export const reportSampleMagic = "SIMPLEPERF";
export const reportSampleVersion = 1;

export const offCpuEventType = "sched:sched_switch";
export const unknownThreadName = "unknown";

// Resolved relative to both src/report-sample and dist/report-sample.
export const reportSampleProtoPath = path.join(__dirname, '..', '..', 'proto', 'cmd_report_sample.proto');

const headerSize = reportSampleMagic.length + 2;

// First byte of a Record whose oneof holds a Sample (field 1, length-delimited).
const sampleRecordTag = 0x0a;

const conversionOptions: protobuf.IConversionOptions = {
    longs: String,
    enums: String,
    arrays: true,
    oneofs: true,
};

interface RawCallChainEntry {
    vaddrInFile?: string | number,
    fileId?: number,
    symbolId?: number,
    executionType?: string,
};

interface RawSample {
    time?: string | number,
    threadId?: number,
    callchain?: RawCallChainEntry[],
    eventCount?: string | number,
    eventTypeId?: number,
};

interface RawLostSituation {
    sampleCount?: string | number,
    lostCount?: string | number,
};

interface RawFile {
    id?: number,
    path?: string,
    symbol?: string[],
    mangledSymbol?: string[],
};

interface RawThread {
    threadId?: number,
    processId?: number,
    threadName?: string,
};

export interface ReportMetaInfo {
    eventType?: string[],
    appPackageName?: string,
    appType?: string,
    androidSdkVersion?: string,
    androidBuildType?: string,
    traceOffcpu?: boolean,
};

interface RawRecord {
    recordData?: string,
    sample?: RawSample,
    lost?: RawLostSituation,
    file?: RawFile,
    thread?: RawThread,
    metaInfo?: ReportMetaInfo,
};

let recordTypePromise: Promise<protobuf.Type> | undefined;

export function loadRecordType(): Promise<protobuf.Type> {
    recordTypePromise ??= protobuf.load(reportSampleProtoPath)
        .then((root) => root.lookupType("simpleperf_report_proto.Record"));
    return recordTypePromise;
}

export function frameOrigin(filePath: string | undefined, executionType: string | undefined): FrameOrigin {
    if (filePath === "[kernel.kallsyms]" || filePath?.endsWith(".ko")) {
        return "kernel";
    }
    // Covers [JIT app cache], [JIT zygote cache] and [JIT cache].
    if (executionType === "JIT_JVM_METHOD" || filePath?.startsWith("[JIT")) {
        return "jit";
    }
    return "native";
}

/**
 * Sample source over the output of `simpleperf report-sample --protobuf`.
 *
 * File and thread records are written after the samples, so the whole buffer
 * is framed and indexed up front. Sample records are kept as raw bytes and
 * decoded one at a time while iterating.
 */
export class ReportSampleReader implements SampleSource {
    private sampleRecords: Uint8Array[] = [];
    private files = new Map<number, RawFile>();
    private threads = new Map<number, RawThread>();
    private meta: ReportMetaInfo | undefined;
    private lostSamples = 0n;
    private totalSamples = 0n;
    private consumed = false;

    private constructor(private readonly recordType: protobuf.Type) {}

    static async fromFile(filePath: string): Promise<ReportSampleReader> {
        let buffer: Buffer;
        try {
            buffer = await fsPromises.readFile(filePath);
        } catch (e: unknown) {
            throw new SessionNotFoundError(filePath, e instanceof Error ? e.message : String(e));
        }

        logger.debug(`Read ${buffer.length} bytes from ${filePath}`);
        return ReportSampleReader.fromBuffer(buffer);
    }

    static async fromBuffer(buffer: Uint8Array): Promise<ReportSampleReader> {
        const reader = new ReportSampleReader(await loadRecordType());
        reader.index(buffer);
        return reader;
    }

    static hasMagic(buffer: Uint8Array): boolean {
        return Buffer.from(buffer.subarray(0, reportSampleMagic.length)).toString("latin1") === reportSampleMagic;
    }

    get metaInfo(): ReportMetaInfo | undefined {
        return this.meta;
    }

    get sampleCount(): number {
        return this.sampleRecords.length;
    }

    eventTypes(): string[] {
        return [...(this.meta?.eventType ?? [])];
    }

    samples(): Iterable<Sample> {
        if (this.consumed) {
            throw new Error("Samples can only be read once");
        }
        this.consumed = true;

        return this.readSamples();
    }

    close(): void {
        this.sampleRecords = [];
        this.files.clear();
        this.threads.clear();
    }

    private *readSamples(): Generator<Sample> {
        for (const bytes of this.sampleRecords) {
            const raw = this.decode(bytes);
            if (raw.sample) {
                yield this.toSample(raw.sample);
            }
        }
    }

    private decode(bytes: Uint8Array): RawRecord {
        let record: RawRecord;
        try {
            record = this.recordType.toObject(this.recordType.decode(bytes), conversionOptions);
        } catch (e: unknown) {
            throw new MalformedSessionError(`Cannot decode report-sample record: ${e instanceof Error ? e.message : String(e)}`);
        }
        return record;
    }

    private index(buffer: Uint8Array) {
        if (buffer.length < headerSize || !ReportSampleReader.hasMagic(buffer)) {
            throw new MalformedSessionError("Not a simpleperf report-sample file");
        }

        const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
        const version = view.getUint16(reportSampleMagic.length, true);
        if (version !== reportSampleVersion) {
            throw new MalformedSessionError(`Unsupported report-sample version ${version}`);
        }

        let offset = headerSize;
        for (;;) {
            if (offset + 4 > buffer.length) {
                throw new MalformedSessionError(`Truncated report-sample file: missing record size at offset ${offset}`);
            }

            const size = view.getUint32(offset, true);
            offset += 4;
            if (size === 0) {
                break;
            }

            if (offset + size > buffer.length) {
                throw new MalformedSessionError(`Truncated report-sample file: record at offset ${offset} needs ${size} bytes, ${buffer.length - offset} left`);
            }

            const bytes = buffer.subarray(offset, offset + size);
            offset += size;

            if (bytes[0] === sampleRecordTag) {
                this.sampleRecords.push(bytes);
                continue;
            }

            const record = this.decode(bytes);
            if (record.sample) {
                this.sampleRecords.push(bytes);
            } else {
                this.indexRecord(record);
            }
        }

        if (offset !== buffer.length) {
            logger.warn(`Ignoring ${buffer.length - offset} bytes after the end of the report-sample records`);
        }

        logger.debug(`Indexed ${this.sampleRecords.length} samples, ${this.files.size} files, ${this.threads.size} threads`);
        if (this.meta?.appPackageName) {
            logger.debug(`Recorded app: ${this.meta.appPackageName}`);
        }
        if (this.lostSamples > 0n) {
            logger.debug(`Lost ${this.lostSamples} of ${this.totalSamples + this.lostSamples} samples while recording`);
        }
    }

    private indexRecord(record: RawRecord) {
        if (record.file) {
            this.files.set(record.file.id ?? 0, record.file);
        } else if (record.thread) {
            this.threads.set(record.thread.threadId ?? 0, record.thread);
        } else if (record.metaInfo) {
            this.meta = record.metaInfo;
        } else if (record.lost) {
            this.totalSamples += BigInt(record.lost.sampleCount ?? 0);
            this.lostSamples += BigInt(record.lost.lostCount ?? 0);
        }
    }

    private toSample(raw: RawSample): Sample {
        const eventTypeId = raw.eventTypeId ?? 0;
        const eventType = this.meta?.eventType?.[eventTypeId];
        if (eventType === undefined) {
            throw new MalformedSessionError(`Sample references unknown event type id ${eventTypeId}`);
        }

        const tid = raw.threadId ?? 0;
        const thread = this.threads.get(tid);

        return {
            eventType,
            pid: thread?.processId ?? tid,
            tid,
            comm: thread?.threadName ?? unknownThreadName,
            frames: (raw.callchain ?? []).map((entry) => this.toFrame(entry)),
            isOffCpu: this.meta?.traceOffcpu === true && eventType === offCpuEventType,
            time: raw.time !== undefined ? BigInt(raw.time) : undefined,
        };
    }

    private toFrame(entry: RawCallChainEntry): Frame {
        const file = this.files.get(entry.fileId ?? 0);
        const origin = frameOrigin(file?.path, entry.executionType);
        const symbolId = entry.symbolId ?? -1;
        const symbols = file?.symbol ?? [];

        if (symbolId >= 0 && symbolId < symbols.length) {
            return { origin, name: symbols[symbolId] };
        }

        return { origin, address: BigInt(entry.vaddrInFile ?? 0), dsoPath: file?.path };
    }
}
