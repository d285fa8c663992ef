/**
 * Validation of caller-supplied alert query and command input.
 *
 * Each parser returns the narrowed value, or null when the input is not
 * acceptable. `rejectInput` turns collected problems into one
 * ALERT_INVALID_INPUT error carrying per-field messages.
 *
 * @module utils/validators/alertInputValidator
 */

import type { AlertKind, AlertSeverity, NotificationRole } from '../../types/index.js';
import {
  ALERT_ERROR_CODES,
  ALERT_KINDS,
  ALERT_SEVERITIES,
  AlertEngineError,
  NOTIFICATION_ROLES,
} from '../../types/index.js';

/** Maximum accepted length of an actor identifier. */
export const MAX_ACTOR_LENGTH = 128;

/** Maximum accepted length of pending-restock notes. */
export const MAX_NOTES_LENGTH = 1000;

export function parseRole(value: string): NotificationRole | null {
  return NOTIFICATION_ROLES.find((role) => role === value) ?? null;
}

export function parseKind(value: string): AlertKind | null {
  return ALERT_KINDS.find((kind) => kind === value) ?? null;
}

export function parseSeverity(value: string): AlertSeverity | null {
  return ALERT_SEVERITIES.find((severity) => severity === value) ?? null;
}

/** Integer in [min, max]; `fallback` when absent, null when out of range or not an integer. */
export function parseBoundedInt(
  value: number | undefined,
  bounds: { min: number; max: number; fallback: number },
): number | null {
  if (value === undefined) return bounds.fallback;
  if (!Number.isInteger(value) || value < bounds.min || value > bounds.max) return null;
  return value;
}

/** Trimmed actor id, or null when blank or too long. */
export function normalizeActor(value: string | undefined): string | null {
  const actor = value?.trim() ?? '';
  if (actor.length === 0 || actor.length > MAX_ACTOR_LENGTH) return null;
  return actor;
}

export type FieldProblems = Record<string, string[]>;

export function addProblem(problems: FieldProblems, field: string, message: string): void {
  (problems[field] ??= []).push(message);
}

/** Throw ALERT_INVALID_INPUT carrying every collected problem. */
export function rejectInput(problems: FieldProblems): never {
  throw new AlertEngineError(
    ALERT_ERROR_CODES.INVALID_INPUT,
    `Invalid input: ${Object.keys(problems).join(', ')}`,
    problems,
  );
}
