/**
 * Resolve a dot-separated path inside a parsed JSON document.
 *
 * Objects are walked by key and arrays by numeric index:
 *   resolvePath({ offers: [{ price: 199 }] }, 'offers.0.price') → 199
 *
 * Returns undefined at the first segment that cannot be followed
 * (missing key, wrong container type, index out of range, null value).
 * Empty segments ("a..b") are skipped.
 */
export function resolvePath(document: unknown, path: string): unknown {
  if (document === null || document === undefined || !path) {
    return undefined;
  }

  let current: unknown = document;

  for (const segment of path.split('.')) {
    if (segment === '') {
      continue;
    }

    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) {
        return undefined;
      }
      const index = parseInt(segment, 10);
      if (index >= current.length) {
        return undefined;
      }
      current = current[index];
    } else if (isRecord(current)) {
      if (!Object.prototype.hasOwnProperty.call(current, segment)) {
        return undefined;
      }
      current = current[segment];
    } else {
      return undefined;
    }

    if (current === null || current === undefined) {
      return undefined;
    }
  }

  return current;
}

/**
 * Text form of a resolved leaf. Objects and arrays are not leaves.
 */
export function scalarToString(value: unknown): string | null {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return isFinite(value) ? String(value) : null;
  }
  if (typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
