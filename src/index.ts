#!/usr/bin/env node
import { runCli } from './core/cli.js';
import { logThought } from './utils/logger.js';

process.on('unhandledRejection', (reason) => {
    void logThought(`[Aether] Unhandled rejection: ${String(reason)}`);
});

process.exitCode = await runCli(process.argv.slice(2));
