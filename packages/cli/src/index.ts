/**
 * @reqsafe/cli - token tooling
 * Provides the issue, verify and refresh commands
 */

export { IssueCommand } from './commands/issue.js';
export type { IssueOptions } from './commands/issue.js';
export { VerifyCommand } from './commands/verify.js';
export type { VerifyOptions } from './commands/verify.js';
export { RefreshCommand } from './commands/refresh.js';
export type { RefreshOptions } from './commands/refresh.js';
export { createProgram, CLI_VERSION } from './program.js';
export type { ProgramOptions } from './program.js';
export { formatOutput, handleError } from './utils.js';
export type {
  CommandResult,
  IssueOutput,
  RefreshOutput,
  TokenOutput,
  Timing,
  VerifyOutput,
} from './types.js';
