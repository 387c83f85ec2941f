/**
 * CLI helpers: caller resolution, error handling, argument parsing.
 */

import type { Command } from 'commander';
import type { PledgeDb, Address } from '@pledge/core';
import { priorityFromName, getDefaultAddress } from '@pledge/core';
import * as out from './output.js';

const VALID_ADDRESS_RE = /^[A-Za-z0-9_.:-]{1,64}$/;
const INTEGER_RE = /^[+-]?\d+$/;

/** Check if an address is usable from the command line */
export function isValidAddress(address: string): boolean {
  return VALID_ADDRESS_RE.test(address);
}

/**
 * Resolve the acting address.
 * Precedence: explicit --as > $PLEDGE_ADDRESS > configured default > null.
 */
export function resolveCaller(
  db: PledgeDb,
  explicit: string | undefined,
  envAddress: string | undefined = process.env['PLEDGE_ADDRESS'],
): Address | null {
  if (explicit) return explicit;
  if (envAddress) return envAddress;
  return getDefaultAddress(db);
}

/** Resolve the caller for a command, printing an error when there is none */
export function requireCaller(db: PledgeDb, cmd: Command): Address | null {
  const g = cmd.optsWithGlobals<{ as?: string }>();
  const caller = resolveCaller(db, g.as);

  if (caller == null) {
    out.error('No caller address. Use --as <address>, set PLEDGE_ADDRESS, or run: pledge whoami <address>');
    return null;
  }
  if (!isValidAddress(caller)) {
    reportInvalidAddress(caller);
    return null;
  }
  return caller;
}

export function reportInvalidAddress(address: string): void {
  out.error(`Invalid address '${address}' (letters, numbers and _ . : - only, at most 64 characters)`);
}

/** Parse a completion flag; null when unrecognised */
export function parseCompletedArg(value: string): boolean | null {
  switch (value.toLowerCase()) {
    case 'true': case 'yes': case 'y': case '1': case 'done': case 'complete': case 'completed': return true;
    case 'false': case 'no': case 'n': case '0': case 'pending': case 'open': return false;
    default: return null;
  }
}

/**
 * Parse a priority level. Names map to their rating; numbers (optionally
 * prefixed with p) pass through so the registry can reject out-of-range ones.
 */
export function parsePriorityArg(level: string): number | null {
  const named = priorityFromName(level);
  if (named !== null) return named;
  const lower = level.toLowerCase();
  const numeric = lower.startsWith('p') ? lower.slice(1) : lower;
  return INTEGER_RE.test(numeric) ? Number(numeric) : null;
}

/** Parse a block offset such as "12" or "+12"; null when not an integer */
export function parseOffsetArg(value: string): number | null {
  return INTEGER_RE.test(value) ? Number(value) : null;
}

/** Parse a positive block count for counter advances */
export function parseCountArg(value: string | undefined): number | null {
  if (value === undefined) return 1;
  const n = parseOffsetArg(value);
  return n != null && n > 0 ? n : null;
}

/**
 * Run a command action, printing thrown errors instead of crashing.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
  }
}
