/**
 * Command tree of the reqsafe CLI
 */

import { Command, InvalidArgumentError } from 'commander';
import type { TokenService } from '@reqsafe/tokens';
import { IssueCommand } from './commands/issue.js';
import { RefreshCommand } from './commands/refresh.js';
import { VerifyCommand } from './commands/verify.js';
import type { CommandResult } from './types.js';
import { formatOutput } from './utils.js';

export const CLI_VERSION = '0.1.0';

export interface ProgramOptions {
  /** Builds the token service on first use, so a bad configuration becomes a command failure */
  tokens: () => TokenService;
  /** Output sink (default: stdout) */
  write?: (text: string) => void;
}

interface IssueFlags {
  claims: string;
  expiresIn?: number;
  json?: boolean;
}

interface VerifyFlags {
  ignoreExpiration?: boolean;
  json?: boolean;
}

interface RefreshFlags {
  expiresIn?: number;
  allowExpired?: boolean;
  json?: boolean;
}

function parseMinutes(value: string): number {
  const minutes = Number(value);
  if (value.trim() === '' || !Number.isFinite(minutes)) {
    throw new InvalidArgumentError('Expected a number of minutes.');
  }
  return minutes;
}

export function createProgram(options: ProgramOptions): Command {
  const write = options.write ?? ((text: string) => process.stdout.write(`${text}\n`));

  const report = (result: CommandResult, json = false): void => {
    write(formatOutput(result, json));
    if (!result.success) {
      process.exitCode = 1;
    }
  };

  const program = new Command();
  program.name('reqsafe').description('Signed token and idempotency tooling').version(CLI_VERSION);

  const token = program.command('token').description('Issue, verify and refresh signed tokens');

  // reqsafe token issue --claims <json>
  token
    .command('issue')
    .description('Sign a claims bundle')
    .requiredOption('-c, --claims <json>', 'claims as a JSON object')
    .option('-e, --expires-in <minutes>', 'lifetime in minutes (default: configured lifetime)', parseMinutes)
    .option('-j, --json', 'output in JSON format')
    .action(async (flags: IssueFlags) => {
      const result = await new IssueCommand(options.tokens).execute(flags.claims, { expiresIn: flags.expiresIn });
      report(result, flags.json);
    });

  // reqsafe token verify <token>
  token
    .command('verify <token>')
    .description('Check a token and print its claims')
    .option('--ignore-expiration', 'accept tokens past their exp claim')
    .option('-j, --json', 'output in JSON format')
    .action(async (value: string, flags: VerifyFlags) => {
      const result = await new VerifyCommand(options.tokens).execute(value, {
        ignoreExpiration: flags.ignoreExpiration,
      });
      report(result, flags.json);
    });

  // reqsafe token refresh <token>
  token
    .command('refresh <token>')
    .description('Re-issue a token with fresh iat and exp')
    .option('-e, --expires-in <minutes>', 'lifetime in minutes (default: configured lifetime)', parseMinutes)
    .option('--allow-expired', 'refresh tokens past their exp claim')
    .option('-j, --json', 'output in JSON format')
    .action(async (value: string, flags: RefreshFlags) => {
      const result = await new RefreshCommand(options.tokens).execute(value, {
        expiresIn: flags.expiresIn,
        allowExpired: flags.allowExpired,
      });
      report(result, flags.json);
    });

  return program;
}
