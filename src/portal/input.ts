/**
 * Input validation at the prompt boundary. Every parser throws
 * MalformedInputError so the controller can re-prompt.
 */

import { MalformedInputError } from '../utils/errors';
import { Need, NEEDS, isNeed } from '../functions/needs';
import { isWellFormedPostalCode, normalizePostalCode } from '../utils/postalCode';

export function requireText(raw: string, what: string): string {
  const value = raw.trim();
  if (!value) {
    throw new MalformedInputError(`Please enter a ${what}.`);
  }
  return value;
}

/** Parses a 1-based menu choice between 1 and `max`. */
export function parseMenuChoice(raw: string, max: number): number {
  const value = raw.trim();
  if (!/^\d+$/.test(value)) {
    throw new MalformedInputError(`Invalid input. Please enter a number between 1 and ${max}.`);
  }
  const choice = parseInt(value, 10);
  if (choice < 1 || choice > max) {
    throw new MalformedInputError(`Invalid input. Please enter a number between 1 and ${max}.`);
  }
  return choice;
}

export function parseYear(raw: string): number {
  const value = raw.trim();
  if (!/^\d{4}$/.test(value)) {
    throw new MalformedInputError('Invalid archive year. Please enter a four-digit year.');
  }
  return parseInt(value, 10);
}

export function parsePostalCode(raw: string): string {
  if (!isWellFormedPostalCode(raw)) {
    throw new MalformedInputError('Please enter a valid postal code.');
  }
  return normalizePostalCode(raw);
}

/**
 * Parses a comma-separated list of need numbers (as listed by NEEDS, 1-based).
 * A blank answer selects no needs.
 */
export function parseNeedSelection(raw: string): Need[] {
  const value = raw.trim();
  if (!value) return [];

  const selected: Need[] = [];
  for (const part of value.split(',')) {
    const choice = parseMenuChoice(part, NEEDS.length);
    const need = NEEDS[choice - 1];
    if (!selected.includes(need)) selected.push(need);
  }
  return selected;
}

/** Accepts need names as typed on the command line. */
export function parseNeedNames(names: readonly string[]): Need[] {
  const selected: Need[] = [];
  for (const name of names) {
    const normalized = name.trim().toLowerCase().replace(/-/g, '_');
    if (!isNeed(normalized)) {
      throw new MalformedInputError(`Unknown need "${name}". Expected one of: ${NEEDS.join(', ')}`);
    }
    if (!selected.includes(normalized)) selected.push(normalized);
  }
  return selected;
}
