/**
 * Display text for arbitrary values
 */

/**
 * `String(value)`, except that objects which cannot be converted to a
 * primitive (null prototype, throwing `toString`) render as `[object Tag]`.
 */
export function toDisplayString(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * Text form of a reply: arrays are joined with a single space, strings
 * pass through, anything else takes its display string.
 */
export function toResponseText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(item => toDisplayString(item)).join(' ');
  }
  return toDisplayString(value);
}
