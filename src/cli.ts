import * as fsPromises from 'fs/promises';
import { parseArgs } from 'util';

import { logger } from './logger';
import { ConfigurationError, StackCollapseError } from './errors';
import { openSession } from './session';
import type { ReportSampleOptions } from './simpleperf';
import { collapseStacks, validateCollapseOptions } from './stackcollapse/collapse';
import type { CollapseOptions, CollapseResult } from './stackcollapse/collapse';
import { formatFoldedStacks, writeFoldedStacks } from './stackcollapse/emitter';

export const defaultInput = "perf.data";

export const usage = `Usage: stackcollapse [-i] <input> [options]

Fold the samples of a simpleperf recording (perf.data) or of a
"simpleperf report-sample --protobuf" file into flame graph stacks.

Options:
  -i, --input <file>       profiling session to read (default: ${defaultInput})
  -o, --output <file>      write folded stacks to a file instead of stdout
      --event-filter <name> fold only samples of this event type
      --pid                prefix stacks with <comm>-<pid>
      --tid                prefix stacks with <comm>-<pid>/<tid>
      --kernel             annotate kernel frames with _[k]
      --jit                annotate JIT frames with _[j]
      --addrs              show <file>[+<offset>] for unknown symbols
      --symdir <dir>       extra symbol directory for simpleperf (repeatable)
      --kallsyms <file>    kernel symbol file for simpleperf
      --show-art-frames    keep ART interpreter frames
      --simpleperf <path>  host simpleperf binary
      --ndk <dir>          Android NDK used to find simpleperf
  -v, --verbose            log debug output to stderr
  -h, --help               show this help
`;

const cliOptions = {
    "input": { type: "string", short: "i" },
    "output": { type: "string", short: "o" },
    "event-filter": { type: "string" },
    "pid": { type: "boolean" },
    "tid": { type: "boolean" },
    "kernel": { type: "boolean" },
    "jit": { type: "boolean" },
    "addrs": { type: "boolean" },
    "symdir": { type: "string", multiple: true },
    "kallsyms": { type: "string" },
    "show-art-frames": { type: "boolean" },
    "simpleperf": { type: "string" },
    "ndk": { type: "string" },
    "verbose": { type: "boolean", short: "v" },
    "help": { type: "boolean", short: "h" },
} as const;

export interface CliConfig {
    input: string,
    output?: string,
    verbose: boolean,
    help: boolean,
    collapse: CollapseOptions,
    reportSample: ReportSampleOptions,
};

function parseArgv(argv: string[]) {
    try {
        return parseArgs({ args: argv, options: cliOptions, allowPositionals: true, strict: true });
    } catch (e: unknown) {
        throw new ConfigurationError(e instanceof Error ? e.message : String(e));
    }
}

export function parseCommandLine(argv: string[]): CliConfig {
    const { values, positionals } = parseArgv(argv);

    if (positionals.length > 1) {
        throw new ConfigurationError(`Expected one input file, got: ${positionals.join(" ")}`);
    }
    if (positionals.length && values.input !== undefined) {
        throw new ConfigurationError("Input given both with --input and as an argument");
    }

    return {
        input: values.input ?? positionals[0] ?? defaultInput,
        output: values.output,
        verbose: values.verbose ?? false,
        help: values.help ?? false,
        collapse: {
            annotateKernel: values.kernel ?? false,
            annotateJit: values.jit ?? false,
            includeAddrs: values.addrs ?? false,
            includePid: values.pid ?? false,
            includeTid: values.tid ?? false,
            eventFilter: values["event-filter"],
        },
        reportSample: {
            simpleperf: values.simpleperf,
            ndkRoot: values.ndk,
            symbolSearchPaths: values.symdir ?? [],
            kallsyms: values.kallsyms,
            showArtFrames: values["show-art-frames"] ?? false,
        },
    };
}

/**
 * Runs the command line and resolves to the process exit code. Nothing is
 * written to the output until every sample has been read.
 */
export async function run(argv: string[], stdout: NodeJS.WritableStream = process.stdout): Promise<number> {
    try {
        const config = parseCommandLine(argv);
        if (config.help) {
            stdout.write(usage);
            return 0;
        }

        logger.setThreshold(config.verbose ? "DEBUG" : "WARN");
        validateCollapseOptions(config.collapse);

        const source = await openSession(config.input, config.reportSample);
        let result: CollapseResult;
        try {
            result = collapseStacks(source, config.collapse);
        } finally {
            source.close();
        }

        logger.info(`Folded ${result.sampleCount} samples of ${result.eventType ?? "no event type"} into ${result.aggregator.size} stacks`);

        if (config.output) {
            await fsPromises.writeFile(config.output, formatFoldedStacks(result.aggregator));
        } else {
            await writeFoldedStacks(result.aggregator, stdout);
        }

        return 0;
    } catch (e: unknown) {
        if (e instanceof StackCollapseError) {
            logger.error(e.message);
            return e.exitCode;
        }

        logger.error(`Unexpected error: ${e instanceof Error ? e.stack ?? e.message : String(e)}`);
        return 1;
    }
}
