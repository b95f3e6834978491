/**
 * Types for the reqsafe CLI
 */

import type { Claims } from '@reqsafe/tokens';

export interface Timing {
  started: number;
  completed: number;
  duration: number;
}

export interface CommandResult<T = TokenOutput> {
  success: boolean;
  data?: T;
  error?: string;
  /** Error code when the failure is a SafetyError */
  code?: string;
  timing?: Timing;
}

export interface IssueOutput {
  kind: 'issue';
  token: string;
  issuedAt?: number;
  expiresAt?: number;
}

export interface VerifyOutput {
  kind: 'verify';
  valid: true;
  claims: Claims;
}

export interface RefreshOutput {
  kind: 'refresh';
  token: string;
  expiresAt?: number;
}

export type TokenOutput = IssueOutput | VerifyOutput | RefreshOutput;
