// ──────────────────────────────────────────
// Shared error classes
// ──────────────────────────────────────────

import { SourceTable } from './types';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Timestamp that is unparseable, carries no UTC offset, or precedes the week epoch. */
export class InvalidTimestampError extends ValidationError {
  constructor(public readonly value: unknown, reason: string) {
    super(`Invalid timestamp ${JSON.stringify(value)}: ${reason}`);
    this.name = 'InvalidTimestampError';
  }
}

export class UpstreamFetchError extends Error {
  constructor(public readonly table: SourceTable, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Fetch failed for ${table}: ${detail}`);
    this.name = 'UpstreamFetchError';
  }
}
