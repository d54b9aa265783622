/**
 * Validation Utilities
 * Common validation helpers for request bodies, params and query strings
 */

import { ValidationError } from '../../core/errors.js';
import { VALIDATION_ERRORS } from '../constants/messages.js';

// ═══════════════════════════════════════════════════════════════════════════
// String Validation
// ═══════════════════════════════════════════════════════════════════════════

export function requireString(
  value: unknown,
  fieldName: string,
  minLength: number = 1,
  maxLength: number = 10000
): string {
  if (typeof value !== 'string') {
    throw new ValidationError(VALIDATION_ERRORS.INVALID_TYPE(fieldName, 'string'), fieldName);
  }

  const trimmed = value.trim();
  if (trimmed.length < minLength) {
    throw new ValidationError(
      minLength === 1 ? VALIDATION_ERRORS.EMPTY_STRING(fieldName) : `${fieldName} must be at least ${minLength} characters`,
      fieldName
    );
  }

  if (trimmed.length > maxLength) {
    throw new ValidationError(`${fieldName} must be at most ${maxLength} characters`, fieldName);
  }

  return trimmed;
}

export function optionalString(
  value: unknown,
  fieldName: string,
  maxLength: number = 10000
): string | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  return requireString(value, fieldName, 1, maxLength);
}

// ═══════════════════════════════════════════════════════════════════════════
// Number Validation
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Accepts integers and their decimal string form (query strings)
 */
export function requireInteger(
  value: unknown,
  fieldName: string,
  min: number,
  max: number
): number {
  const num = typeof value === 'string' && /^-?\d+$/.test(value.trim()) ? Number(value) : value;

  if (typeof num !== 'number' || !Number.isInteger(num)) {
    throw new ValidationError(VALIDATION_ERRORS.INVALID_TYPE(fieldName, 'integer'), fieldName);
  }

  if (num < min || num > max) {
    throw new ValidationError(VALIDATION_ERRORS.OUT_OF_RANGE(fieldName, min, max), fieldName);
  }

  return num;
}

export function optionalInteger(
  value: unknown,
  fieldName: string,
  min: number,
  max: number,
  defaultValue: number
): number {
  if (value === undefined || value === null || value === '') {
    return defaultValue;
  }
  return requireInteger(value, fieldName, min, max);
}

// ═══════════════════════════════════════════════════════════════════════════
// Boolean Validation
// ═══════════════════════════════════════════════════════════════════════════

export function requireBoolean(value: unknown, fieldName: string): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (value === 'true') return true;
  if (value === 'false') return false;

  throw new ValidationError(VALIDATION_ERRORS.INVALID_TYPE(fieldName, 'boolean'), fieldName);
}

export function optionalBoolean(
  value: unknown,
  fieldName: string,
  defaultValue: boolean
): boolean {
  if (value === undefined || value === null) {
    return defaultValue;
  }
  return requireBoolean(value, fieldName);
}

// ═══════════════════════════════════════════════════════════════════════════
// Enum Validation
// ═══════════════════════════════════════════════════════════════════════════

export function requireEnum<T extends string>(
  value: unknown,
  fieldName: string,
  validValues: readonly T[]
): T {
  const match = validValues.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ValidationError(VALIDATION_ERRORS.INVALID_ENUM(fieldName, validValues), fieldName);
  }
  return match;
}

export function optionalEnum<T extends string>(
  value: unknown,
  fieldName: string,
  validValues: readonly T[]
): T | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  return requireEnum(value, fieldName, validValues);
}

// ═══════════════════════════════════════════════════════════════════════════
// Object Validation
// ═══════════════════════════════════════════════════════════════════════════

export function requireObject(
  value: unknown,
  fieldName: string
): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError(VALIDATION_ERRORS.INVALID_TYPE(fieldName, 'object'), fieldName);
  }
  return { ...value };
}
