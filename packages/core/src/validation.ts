/**
 * Field-level predicates. Pure and total: they never throw.
 */

import type { Priority } from './types/priority.js';

export const MAX_DESCRIPTION_LENGTH = 100;

/** Number of Unicode code points (astral characters count once) */
export function characterCount(text: string): number {
  return Array.from(text).length;
}

export function isNonEmpty(text: string): boolean {
  return text.length > 0;
}

export function isWithinLength(text: string, max: number = MAX_DESCRIPTION_LENGTH): boolean {
  return characterCount(text) <= max;
}

export function isValidPriority(value: number): value is Priority {
  return Number.isInteger(value) && value >= 1 && value <= 3;
}

export function isValidOffset(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

/** InvalidInput message for a description, or null when it is acceptable */
export function validateDescription(text: string): string | null {
  if (!isNonEmpty(text)) return 'Description must not be empty';
  if (!isWithinLength(text)) return `Description must be at most ${MAX_DESCRIPTION_LENGTH} characters`;
  return null;
}
