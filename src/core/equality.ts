/**
 * Structural equality over the plain data the core stores: primitives, arrays and
 * plain objects. Identity is a fast path, never a requirement.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) return false;

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false;
    }
    return true;
  }
  if (Array.isArray(b)) return false;

  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  if (keysA.length !== keysB.length) return false;

  const recA: Record<string, unknown> = { ...a };
  const recB: Record<string, unknown> = { ...b };
  for (const key of keysA) {
    if (!Object.prototype.hasOwnProperty.call(recB, key)) return false;
    if (!deepEqual(recA[key], recB[key])) return false;
  }
  return true;
}

/**
 * Returns `prev` when `next` is value-equal to it, so unchanged branches keep
 * their identity across transitions.
 */
export function reuseIfEqual<T>(prev: T, next: T): T {
  return deepEqual(prev, next) ? prev : next;
}

/**
 * Per-key structural sharing for records such as the seat map: entries whose
 * value did not change keep their previous reference, and the whole record is
 * reused when every entry matches.
 */
export function shareRecord<V>(
  prev: Readonly<Record<number, V>>,
  next: Readonly<Record<number, V>>
): Readonly<Record<number, V>> {
  const out: Record<number, V> = {};
  let changed = Object.keys(prev).length !== Object.keys(next).length;
  for (const key of Object.keys(next).map(Number)) {
    const before = prev[key];
    const after = next[key];
    if (before !== undefined && deepEqual(before, after)) {
      out[key] = before;
    } else {
      out[key] = after;
      changed = true;
    }
  }
  return changed ? out : prev;
}
