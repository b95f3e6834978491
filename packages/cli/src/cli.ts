#!/usr/bin/env node
/**
 * reqsafe CLI
 * Commands: token issue, token verify, token refresh
 */

import { createLogger, loadConfig } from '@reqsafe/kernel';
import { TokenService } from '@reqsafe/tokens';
import { createProgram } from './program.js';

const program = createProgram({
  tokens: () => {
    const config = loadConfig();
    return TokenService.fromConfig(config, createLogger('reqsafe-cli', { level: config.logLevel }));
  },
});

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
