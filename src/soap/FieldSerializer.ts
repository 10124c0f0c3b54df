/**
 * Turns a data record into the ordered field list of a zObject
 */

import { PreconditionError } from '../errors/PreconditionError';
import { ZObjectData } from '../models/ZObject';

export interface SerializeOptions {
  /**
   * Omit every falsy value (0, false, NaN) as well as null, undefined
   * and ''. Mirrors the legacy API clients.
   */
  omitFalsyFields?: boolean;
}

/**
 * AccountId -> accountId
 */
export function camelCaseKey(field: string): string {
  return field.charAt(0).toLowerCase() + field.slice(1);
}

/**
 * NoEmailForZeroAmountInvoice -> no_email_for_zero_amount_invoice
 */
export function snakeCaseKey(field: string): string {
  return field
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z])([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
}

function lookup(data: ZObjectData, field: string): unknown {
  for (const key of [camelCaseKey(field), snakeCaseKey(field)]) {
    if (Object.prototype.hasOwnProperty.call(data, key) && data[key] !== undefined) {
      return data[key];
    }
  }
  return undefined;
}

/**
 * Decimal notation for numbers String() would write with an exponent
 * (1e-7 -> 0.0000001, 1e+21 -> 1000000000000000000000)
 */
function plainDecimal(value: number): string {
  const text = String(value);
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) {
    return text;
  }

  const [, sign, whole, fraction = '', exponent] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

function isOmitted(value: unknown, omitFalsyFields: boolean): boolean {
  if (value === undefined || value === null || value === '') {
    return true;
  }
  return omitFalsyFields && !value;
}

/**
 * Text content for a field value
 * @throws PreconditionError for values with no XML text form
 */
export function formatFieldValue(field: string, value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw PreconditionError.unserializableValue(field, value);
    }
    return plainDecimal(value);
  }
  if (typeof value === 'bigint' || typeof value === 'boolean') {
    return value.toString();
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw PreconditionError.unserializableValue(field, value);
    }
    // yyyy-mm-dd
    return value.toISOString().slice(0, 10);
  }
  throw PreconditionError.unserializableValue(field, value);
}

/**
 * Whitelisted, present fields of `data` in `fields` order
 */
export function serializeFields(
  fields: readonly string[],
  data: ZObjectData,
  options: SerializeOptions = {}
): Array<[string, string]> {
  const omitFalsyFields = options.omitFalsyFields ?? false;
  const serialized: Array<[string, string]> = [];

  for (const field of fields) {
    const value = lookup(data, field);
    if (isOmitted(value, omitFalsyFields)) {
      continue;
    }
    serialized.push([field, formatFieldValue(field, value)]);
  }

  return serialized;
}
