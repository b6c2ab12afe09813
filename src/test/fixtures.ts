import { Writable } from 'stream';

import type { Frame, Sample } from '../commonTypes';
import { loadRecordType, reportSampleMagic, reportSampleVersion } from '../report-sample/reportSampleReader';

export type FixtureRecord = Record<string, unknown>;

export function captureStream(): { stream: Writable, text: () => string } {
    const chunks: string[] = [];
    const stream = new Writable({
        write(chunk: Buffer | string, _encoding, callback) {
            chunks.push(chunk.toString());
            callback();
        },
    });
    return { stream, text: () => chunks.join("") };
}

export function sample(eventType: string, frames: Frame[], overrides: Partial<Sample> = {}): Sample {
    return { eventType, pid: 100, tid: 101, comm: "app", frames, ...overrides };
}

export function native(...names: string[]): Frame[] {
    return names.map((name): Frame => ({ origin: "native", name }));
}

export async function encodeReportSample(records: FixtureRecord[], options: { version?: number, terminate?: boolean } = {}): Promise<Buffer> {
    const recordType = await loadRecordType();

    const header = Buffer.alloc(reportSampleMagic.length + 2);
    header.write(reportSampleMagic, 0, "latin1");
    header.writeUInt16LE(options.version ?? reportSampleVersion, reportSampleMagic.length);

    const parts: Buffer[] = [header];
    for (const record of records) {
        const bytes = recordType.encode(recordType.fromObject(record)).finish();
        const size = Buffer.alloc(4);
        size.writeUInt32LE(bytes.length);
        parts.push(size, Buffer.from(bytes));
    }

    if (options.terminate ?? true) {
        parts.push(Buffer.alloc(4));
    }

    return Buffer.concat(parts);
}

function entry(fileId: number, symbolId: number, extra: FixtureRecord = {}): FixtureRecord {
    return { vaddrInFile: 0x1000 + symbolId * 0x10, fileId, symbolId, ...extra };
}

const bar = entry(0, 2);
const foo = entry(0, 1);
const main = entry(0, 0);
const pageFault = entry(1, 0);
const workerRun = entry(2, 0);
const unresolved = { vaddrInFile: 0x1a2b, fileId: 3, symbolId: -1 };

function sampleRecord(eventTypeId: number, threadId: number, callchain: FixtureRecord[]): FixtureRecord {
    return { sample: { time: 1000, threadId, eventTypeId, eventCount: 1, callchain } };
}

/**
 * A small two-event session laid out the way report-sample writes it:
 * meta info first, then samples, then files and threads.
 *
 * cpu-cycles samples (first event type in sample order):
 *   tid 101: main;foo;bar x2, main;<unresolved libc.so> x1
 *   tid 102: main;foo;bar;do_page_fault (kernel)
 *   tid 201: main;com.example.Worker.run (JIT)
 * cpu-clock samples:
 *   tid 101: main;foo
 *   tid 102: main
 */
export function twoEventSessionRecords(): FixtureRecord[] {
    return [
        { metaInfo: { eventType: ["cpu-cycles", "cpu-clock"], appPackageName: "com.example.app" } },
        sampleRecord(0, 101, [bar, foo, main]),
        sampleRecord(0, 101, [bar, foo, main]),
        sampleRecord(1, 101, [foo, main]),
        sampleRecord(0, 102, [pageFault, bar, foo, main]),
        sampleRecord(0, 201, [workerRun, main]),
        sampleRecord(0, 101, [unresolved, main]),
        sampleRecord(1, 102, [main]),
        { lost: { sampleCount: 7, lostCount: 1 } },
        { file: { id: 0, path: "/data/local/tmp/app", symbol: ["main", "foo", "bar"] } },
        { file: { id: 1, path: "[kernel.kallsyms]", symbol: ["do_page_fault"] } },
        { file: { id: 2, path: "[JIT app cache]", symbol: ["com.example.Worker.run"] } },
        { file: { id: 3, path: "/system/lib64/libc.so", symbol: [] } },
        { thread: { threadId: 101, processId: 100, threadName: "app" } },
        { thread: { threadId: 102, processId: 100, threadName: "worker" } },
        { thread: { threadId: 201, processId: 200, threadName: "app" } },
    ];
}
