/**
 * Resolve a possibly negative index against a sequence length.
 * Returns null when the index falls outside the sequence.
 */
export function resolveIndex(index: number, length: number): number | null {
  if (!Number.isInteger(index)) return null;
  const resolved = index < 0 ? length + index : index;
  if (resolved < 0 || resolved >= length) return null;
  return resolved;
}

function clampBound(bound: number, length: number): number {
  if (bound < 0) return Math.max(0, length + bound);
  return Math.min(bound, length);
}

/**
 * Slice with negative-index support on both bounds; out-of-range bounds clamp.
 */
export function sliceRange<T>(items: readonly T[], start?: number, end?: number): T[] {
  const from = start === undefined ? 0 : clampBound(Math.trunc(start), items.length);
  const to = end === undefined ? items.length : clampBound(Math.trunc(end), items.length);
  return items.slice(from, Math.max(from, to));
}
