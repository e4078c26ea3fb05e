#!/usr/bin/env node
import { runCli } from './cli.js';
import { createNodeContext } from './context.js';
import { createLogger } from './logger.js';

const log = createLogger('Cli');

runCli(process.argv.slice(2), createNodeContext()).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    log.error('Unexpected failure', error);
    process.exitCode = 1;
  },
);
