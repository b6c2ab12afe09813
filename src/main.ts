#!/usr/bin/env node
import { logger } from './logger';
import { run } from './cli';

run(process.argv.slice(2)).then(
    (code) => {
        process.exitCode = code;
    },
    (e: unknown) => {
        logger.error(e);
        process.exitCode = 1;
    }
);
