/**
 * CLI utilities and formatting
 */

import chalk from 'chalk';
import { isSafetyError } from '@reqsafe/kernel';
import type { CommandResult, TokenOutput } from './types.js';

function formatInstant(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

export function formatOutput(result: CommandResult, json = false): string {
  if (json) {
    return JSON.stringify(result, null, 2);
  }

  if (!result.success || !result.data) {
    const code = result.code ? `[${result.code}] ` : '';
    return chalk.red(`Error: ${code}${result.error ?? 'Unknown error'}`);
  }

  return formatData(result.data);
}

function formatData(data: TokenOutput): string {
  switch (data.kind) {
    case 'issue':
    case 'refresh': {
      const lines = [chalk.green(data.kind === 'issue' ? 'Token issued' : 'Token refreshed'), data.token];
      if (data.expiresAt !== undefined) {
        lines.push(`Expires: ${formatInstant(data.expiresAt)}`);
      }
      return lines.join('\n');
    }
    case 'verify':
      return [chalk.green('Token is valid'), JSON.stringify(data.claims, null, 2)].join('\n');
  }
}

export function handleError(error: unknown): CommandResult<never> {
  if (isSafetyError(error)) {
    return { success: false, error: error.message, code: error.code };
  }
  return {
    success: false,
    error: error instanceof Error ? error.message : String(error),
  };
}

export function timing() {
  const started = Date.now();
  return {
    started,
    end: () => {
      const completed = Date.now();
      return {
        started,
        completed,
        duration: completed - started,
      };
    },
  };
}
