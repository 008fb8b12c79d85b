import { parse, parseNumberAndBigInt, stringify } from 'lossless-json';
import { isJsonObject } from '../domain/ping-shape.js';

/**
 * JSON text handling for submissions and stream fields.
 *
 * Integers beyond 2^53 parse to `bigint` and stringify back digit for
 * digit; every other number is a plain `number`.
 */
export function parseJson(text: string): unknown {
  return parse(text, null, parseNumberAndBigInt);
}

export function stringifyJson(value: unknown): string {
  const text = stringify(value);
  if (text === undefined) throw new TypeError('value has no JSON representation');
  return text;
}

/**
 * Returns `value` with every bigint widened to a number, the view a
 * validator expecting plain JSON numbers needs. Subtrees without a bigint
 * are shared, not copied.
 */
export function widenBigInts(value: unknown): unknown {
  if (typeof value === 'bigint') return Number(value);

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    const widened = items.map(widenBigInts);
    return widened.some((item, i) => item !== items[i]) ? widened : value;
  }

  if (isJsonObject(value)) {
    const entries = Object.entries(value);
    const widened = entries.map(([key, item]): [string, unknown] => [key, widenBigInts(item)]);
    // fromEntries keeps a `__proto__` key as an own property
    return widened.some(([, item], i) => item !== entries[i]?.[1]) ? Object.fromEntries(widened) : value;
  }

  return value;
}
