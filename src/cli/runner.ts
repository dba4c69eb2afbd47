#!/usr/bin/env node
// src/cli/runner.ts
import { logger } from '../utils/logger.js';
import { runCli } from './program.js';

runCli(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        logger.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    });
