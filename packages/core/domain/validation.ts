/**
 * Input parsing for user-supplied values.
 *
 * Chat input arrives as text; these zod schemas turn it into typed values
 * and every failure surfaces as a ValidationError with the first issue's
 * message.
 *
 * @module packages/core/domain/validation
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';

// =============================================================================
// Limits
// =============================================================================

/**
 * Identifier limit in UTF-8 bytes. Button payloads carry identifiers and
 * Telegram caps callback data at 64 bytes, leaving room for the action prefix.
 */
export const MAX_IDENTIFIER_BYTES = 48;

/** `sub_<account>:<slot>` payloads must fit the same 64 bytes */
export const MAX_SLOT_KEY_LENGTH = 11;

/** Upper bound for a single duration (ten years) */
export const MAX_DURATION_DAYS = 3650;

export const MAX_SLOTS_PER_ACCOUNT = 100;

const encoder = new TextEncoder();

// =============================================================================
// Schemas
// =============================================================================

const identifierSchema = (label: string) =>
  z
    .string()
    .trim()
    .min(1, `${label} must not be empty`)
    .refine((value) => encoder.encode(value).length <= MAX_IDENTIFIER_BYTES, {
      message: `${label} must be at most ${MAX_IDENTIFIER_BYTES} bytes`,
    });

export const personNameSchema = identifierSchema('Person name');
export const accountIdSchema = identifierSchema('Account id');
export const serviceNameSchema = identifierSchema('Service name');

export const slotKeySchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9]+$/, 'Slot keys must be letters and digits only')
  .max(MAX_SLOT_KEY_LENGTH, `Slot keys must be at most ${MAX_SLOT_KEY_LENGTH} characters`);

export const durationDaysSchema = z
  .number()
  .int('Duration must be a whole number of days')
  .positive('Duration must be positive')
  .max(MAX_DURATION_DAYS, `Duration must be at most ${MAX_DURATION_DAYS} days`);

export const priceSchema = z
  .number()
  .finite('Price must be a number')
  .nonnegative('Price must not be negative');

export const slotCountSchema = z
  .number()
  .int('Slot count must be a whole number')
  .nonnegative('Slot count must not be negative')
  .max(MAX_SLOTS_PER_ACCOUNT, `Slot count must be at most ${MAX_SLOTS_PER_ACCOUNT}`);

const integerText = (label: string) =>
  z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/, `${label} must be a number`)
    .transform(Number);

const decimalText = z
  .string()
  .trim()
  .regex(/^[+-]?(\d+([.,]\d*)?|[.,]\d+)$/, 'Price must be a number')
  .transform((value) => Number(value.replace(',', '.')));

// =============================================================================
// Parsers
// =============================================================================

/**
 * Parse a value against a schema, converting failures to ValidationError.
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue?.message ?? 'Invalid input');
  }
  return result.data;
}

export function parsePersonName(text: string): string {
  return parseWith(personNameSchema, text);
}

export function parseAccountId(text: string): string {
  return parseWith(accountIdSchema, text);
}

export function parseServiceName(text: string): string {
  return parseWith(serviceNameSchema, text);
}

export function parseSlotKey(text: string): string {
  return parseWith(slotKeySchema, text);
}

/**
 * Parse a duration typed by a user ("30").
 */
export function parseDurationDays(text: string): number {
  return parseWith(integerText('Duration').pipe(durationDaysSchema), text);
}

/**
 * Parse a price typed by a user ("9.99", "9,99").
 */
export function parsePrice(text: string): number {
  return parseWith(decimalText.pipe(priceSchema), text);
}

/**
 * Parse a default slot count ("4").
 */
export function parseSlotCount(text: string): number {
  return parseWith(integerText('Slot count').pipe(slotCountSchema), text);
}

/**
 * Round a money amount to cents.
 */
export function roundToCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}
