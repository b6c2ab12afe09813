import * as os from 'os';
import * as path from 'path';
import * as fsPromises from 'fs/promises';
import type { Stats } from 'fs';

import type { SampleSource } from './commonTypes';
import { MalformedSessionError, SessionNotFoundError } from './errors';
import { logger } from './logger';
import { ReportSampleReader, reportSampleMagic } from './report-sample/reportSampleReader';
import { convertRecordFile } from './simpleperf';
import type { ReportSampleOptions } from './simpleperf';
import * as utils from './utils';

// Magic of a raw perf.data recording as written by simpleperf record.
export const recordFileMagic = "PERFILE2";

export type SessionFormat = "report-sample" | "record";

async function readHeader(inputPath: string, length: number): Promise<Buffer> {
    let handle: fsPromises.FileHandle;
    try {
        handle = await fsPromises.open(inputPath, "r");
    } catch (e: unknown) {
        throw new SessionNotFoundError(inputPath, e instanceof Error ? e.message : String(e));
    }

    try {
        const header = Buffer.alloc(length);
        const { bytesRead } = await handle.read(header, 0, length, 0);
        return header.subarray(0, bytesRead);
    } finally {
        await handle.close();
    }
}

export async function detectSessionFormat(inputPath: string): Promise<SessionFormat> {
    let stats: Stats;
    try {
        stats = await fsPromises.stat(inputPath);
    } catch (e: unknown) {
        throw new SessionNotFoundError(inputPath, e instanceof Error ? e.message : String(e));
    }
    if (!stats.isFile()) {
        throw new SessionNotFoundError(inputPath, "not a file");
    }

    const header = (await readHeader(inputPath, Math.max(reportSampleMagic.length, recordFileMagic.length))).toString("latin1");
    if (header.startsWith(reportSampleMagic)) {
        return "report-sample";
    }
    if (header.startsWith(recordFileMagic)) {
        return "record";
    }

    throw new MalformedSessionError(`"${inputPath}" is neither a simpleperf recording nor a report-sample file`);
}

/**
 * Opens a profiling session for reading. Raw recordings are converted with the
 * host simpleperf into a temporary file that is removed once it is read.
 */
export async function openSession(inputPath: string, options: ReportSampleOptions = {}): Promise<SampleSource> {
    const format = await detectSessionFormat(inputPath);
    if (format === "report-sample") {
        return ReportSampleReader.fromFile(inputPath);
    }

    const tracePath = path.join(os.tmpdir(), `stackcollapse-${utils.randomString(8)}.trace`);
    logger.debug(`Converting ${inputPath} to ${tracePath}`);

    try {
        await convertRecordFile(inputPath, tracePath, options);
        try {
            return await ReportSampleReader.fromFile(tracePath);
        } catch (e: unknown) {
            if (e instanceof SessionNotFoundError) {
                throw new MalformedSessionError(`simpleperf report-sample wrote no output for "${inputPath}"`);
            }
            throw e;
        }
    } finally {
        await fsPromises.rm(tracePath, { force: true });
    }
}
