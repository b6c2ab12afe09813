import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { ConfigurationError, MalformedSessionError, SessionNotFoundError } from '../errors';
import { detectSessionFormat, openSession, recordFileMagic } from '../session';
import { encodeReportSample, twoEventSessionRecords } from './fixtures';

let tmpDir: string;

beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "stackcollapse-session-"));
});

afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("detectSessionFormat", () => {
    it("recognizes report-sample files and raw recordings", async () => {
        const trace = path.join(tmpDir, "a.trace");
        fs.writeFileSync(trace, await encodeReportSample([]));
        const record = path.join(tmpDir, "perf.data");
        fs.writeFileSync(record, `${recordFileMagic}h\u0000`);

        await expect(detectSessionFormat(trace)).resolves.toBe("report-sample");
        await expect(detectSessionFormat(record)).resolves.toBe("record");
    });

    it("rejects directories and missing files", async () => {
        await expect(detectSessionFormat(tmpDir)).rejects.toThrow(SessionNotFoundError);
        await expect(detectSessionFormat(path.join(tmpDir, "missing"))).rejects.toThrow(SessionNotFoundError);
    });

    it("rejects files of another format", async () => {
        const other = path.join(tmpDir, "other.bin");
        fs.writeFileSync(other, "PK\u0003\u0004");

        await expect(detectSessionFormat(other)).rejects.toThrow(MalformedSessionError);
    });
});

describe("openSession", () => {
    it("reads report-sample files directly", async () => {
        const trace = path.join(tmpDir, "session.trace");
        fs.writeFileSync(trace, await encodeReportSample(twoEventSessionRecords()));

        const source = await openSession(trace);
        try {
            expect(source.eventTypes()).toEqual(["cpu-cycles", "cpu-clock"]);
            expect([...source.samples()]).toHaveLength(7);
        } finally {
            source.close();
        }
    });

    it("needs a host simpleperf for raw recordings", async () => {
        const record = path.join(tmpDir, "raw.data");
        fs.writeFileSync(record, recordFileMagic);

        await expect(openSession(record, { simpleperf: path.join(tmpDir, "no-simpleperf") })).rejects.toThrow(ConfigurationError);
    });

    it("reports a conversion that writes nothing as a malformed recording", async () => {
        const record = path.join(tmpDir, "silent.data");
        fs.writeFileSync(record, recordFileMagic);
        const simpleperf = path.join(tmpDir, "silent-simpleperf");
        fs.writeFileSync(simpleperf, "#!/bin/sh\nexit 0\n", { mode: 0o755 });

        const opening = openSession(record, { simpleperf });
        await expect(opening).rejects.toThrow(MalformedSessionError);
        await expect(opening).rejects.toThrow(`simpleperf report-sample wrote no output for "${record}"`);
    });
});
