#!/usr/bin/env node
import { CommanderError } from 'commander';
import { logger } from './Logger.js';
import { main } from './Main.js';

main().catch((err: unknown) => {
    // --help / --version exit through commander with code 0.
    if (err instanceof CommanderError) process.exit(err.exitCode);

    logger.fatal({ err }, 'Pushover MCP server failed to start');
    process.exit(1);
});
