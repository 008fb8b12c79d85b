/**
 * Splits a submission path into its non-empty components.
 *
 *   /foo/bar      -> ["foo", "bar"]
 *   ///foo//bar/  -> ["foo", "bar"]
 *   foo/bar/      -> ["foo", "bar"]
 *   /             -> []
 *
 * Anything that is not a string yields no components; the caller treats
 * a short result as a routing error.
 */
export function splitPath(path: unknown): string[] {
  if (typeof path !== 'string') return [];
  return path.split('/').filter((segment) => segment.length > 0);
}
