import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs';
import * as fsPromises from 'fs/promises';
import * as teen_process from 'teen_process';

import { logger } from './logger';
import { ConfigurationError, MalformedSessionError } from './errors';
import * as androidPaths from './androidPaths';

export interface ReportSampleOptions {
    // Host simpleperf binary. Looked up when not given.
    simpleperf?: string,
    ndkRoot?: string,
    symbolSearchPaths?: string[],
    kallsyms?: string,
    showArtFrames?: boolean,
};

function getHostPlatformDir(platform: NodeJS.Platform): string {
    switch (platform) {
        case "win32":
            return "windows";
        case "darwin":
            return "darwin";
        default:
            return "linux";
    }
}

async function isExecutable(file: string) {
    try {
        await fsPromises.access(file, os.platform() === "win32" ? fs.constants.R_OK : fs.constants.X_OK);
        return true;
    }
    catch {
        return false;
    }
}

export function getNdkSimpleperfPath(ndkRoot: string, platform: NodeJS.Platform = os.platform()): string {
    const binary = platform === "win32" ? "simpleperf.exe" : "simpleperf";
    return path.join(ndkRoot, "simpleperf", "bin", getHostPlatformDir(platform), "x86_64", binary);
}

export async function getHostSimpleperf(customPath?: string, customNdkRoot?: string): Promise<string> {
    if (customPath) {
        if (await isExecutable(customPath)) {
            return customPath;
        }
        throw new ConfigurationError(`Specified simpleperf "${customPath}" is not executable`);
    }

    const fromEnv = process.env.SIMPLEPERF;
    if (fromEnv && await isExecutable(fromEnv)) {
        return fromEnv;
    }

    const ndkRoot = await androidPaths.findNdkRoot(customNdkRoot);
    if (ndkRoot) {
        logger.debug(`Using ndkRoot: ${ndkRoot}`);
        const simpleperf = getNdkSimpleperfPath(ndkRoot);
        if (await isExecutable(simpleperf)) {
            return simpleperf;
        }
    }

    throw new ConfigurationError("Cannot find host simpleperf. Use --simpleperf, set SIMPLEPERF, or install the Android NDK");
}

export async function buildReportSampleArgs(recordFile: string, traceFile: string, options: ReportSampleOptions): Promise<string[]> {
    const args = ["report-sample", "--protobuf", "--show-callchain", "--show-execution-type", "-i", recordFile, "-o", traceFile];

    for (const symbolSearchPath of options.symbolSearchPaths ?? []) {
        const normalizedPath = path.normalize(symbolSearchPath);
        try {
            await fsPromises.access(normalizedPath, fs.constants.R_OK);

            args.push("--symdir", normalizedPath);
        } catch (e) {
            logger.warn(`Ignoring symbol search path "${normalizedPath}": ${e}`);
        }
    }

    if (options.kallsyms) {
        args.push("--kallsyms", options.kallsyms);
    }

    if (options.showArtFrames) {
        args.push("--show-art-frames");
    }

    return args;
}

function describeFailure(e: unknown): string {
    if (typeof e === "object" && e !== null && "stderr" in e && typeof e.stderr === "string" && e.stderr.trim()) {
        return e.stderr.trim();
    }
    return e instanceof Error ? e.message : String(e);
}

/**
 * Converts a raw simpleperf recording into report-sample protobuf records
 * using the host simpleperf.
 */
export async function convertRecordFile(recordFile: string, traceFile: string, options: ReportSampleOptions = {}): Promise<void> {
    const simpleperfHostPath = await getHostSimpleperf(options.simpleperf, options.ndkRoot);
    const simpleperfArgs = await buildReportSampleArgs(recordFile, traceFile, options);

    logger.debug(`Running simpleperf: ${simpleperfHostPath} ${simpleperfArgs.join(" ")}`);

    try {
        const { code } = await teen_process.exec(
            simpleperfHostPath,
            simpleperfArgs,
            {
                logger: {
                    debug(...args: unknown[]) {
                        logger.debug("simpleperf:", ...args);
                    },
                }
            }
        );

        logger.debug(`simpleperf report-sample exited with code ${code}`);
    } catch (e: unknown) {
        throw new MalformedSessionError(`simpleperf report-sample failed for "${recordFile}": ${describeFailure(e)}`);
    }
}
