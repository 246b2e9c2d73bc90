import { isLosslessNumber, type LosslessNumber } from 'lossless-json';

export type JsonPrimitive = string | number | boolean | null;

/**
 * Number tokens that a JS number would not reproduce exactly (big integers,
 * out-of-range exponents, `1.50`) stay `LosslessNumber`s holding the source text.
 */
export type JsonValue = JsonPrimitive | LosslessNumber | JsonObject | JsonValue[];

export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

export function hasOwn(obj: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}
