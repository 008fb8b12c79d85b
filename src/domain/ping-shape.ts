/**
 * Ping shape detection.
 *
 * Pings carry no single discriminant, so the shape is sniffed from the
 * top-level keys in a fixed priority order. Classification happens once
 * per document; the normalizer switches on the resulting tag.
 */

export type JsonObject = Record<string, unknown>;

export type Scalar = string | number | boolean;

export type PingShape =
  /** FxOS first-time-use ping: `ver` is exactly 3. */
  | { readonly kind: 'legacy-ftu'; readonly ver: 3 }
  /** Old-style telemetry with dimensions under `info`. */
  | { readonly kind: 'legacy'; readonly ver: Scalar }
  /** Unified telemetry with `application` and `environment` sections. */
  | { readonly kind: 'structured'; readonly version: Scalar }
  /** FxOS app usage ping keyed by `deviceinfo`. */
  | { readonly kind: 'appusage' }
  /** Mobile "core" ping. */
  | { readonly kind: 'core'; readonly v: Scalar }
  /** Anything else; stored verbatim. */
  | { readonly kind: 'generic' };

export type PingKind = PingShape['kind'];

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A scalar that counts as "set": not false, null, absent, or a container. */
function truthyScalar(value: unknown): Scalar | undefined {
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (value === true) return value;
  return undefined;
}

export function classifyPing(document: unknown): PingShape {
  if (!isJsonObject(document)) return { kind: 'generic' };

  const ver = truthyScalar(document['ver']);
  if (ver !== undefined) {
    return ver === 3 ? { kind: 'legacy-ftu', ver } : { kind: 'legacy', ver };
  }

  const version = truthyScalar(document['version']);
  if (version !== undefined) return { kind: 'structured', version };

  if (document['deviceinfo'] !== undefined && document['deviceinfo'] !== null) {
    return { kind: 'appusage' };
  }

  const v = truthyScalar(document['v']);
  if (v !== undefined) return { kind: 'core', v };

  return { kind: 'generic' };
}

/** Walks a chain of object keys; any non-object along the way yields undefined. */
export function findPath(root: unknown, ...keys: string[]): unknown {
  let node = root;
  for (const key of keys) {
    if (!isJsonObject(node)) return undefined;
    node = node[key];
  }
  return node;
}

/** Like `findPath` but only returns scalar leaves. */
export function findScalar(root: unknown, ...keys: string[]): Scalar | undefined {
  const value = findPath(root, ...keys);
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return undefined;
}
