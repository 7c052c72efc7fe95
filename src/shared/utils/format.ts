/**
 * Rendering of argument values for failure messages and matcher labels.
 *
 * Strings render without quotes and lists as space-separated items in
 * brackets, so a call flash('Hello', 333) shows as `[Hello 333]`.
 */

export function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (typeof value === 'symbol') return value.toString();
  if (typeof value === 'function') {
    return value.name ? `function ${value.name}` : 'function';
  }
  if (Array.isArray(value)) return formatList(value);
  if (value instanceof Error) return value.message;
  if (value instanceof Map) {
    const entries = [...value.entries()].map(([key, item]) => `${formatValue(key)}:${formatValue(item)}`);
    return `Map[${entries.join(' ')}]`;
  }
  if (value instanceof Set) return `Set${formatList([...value])}`;

  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return '[Unserializable object]';
  }
}

export function formatList(values: readonly unknown[]): string {
  return `[${values.map(formatValue).join(' ')}]`;
}

/** Runtime type name of a value, used in return type errors */
export function describeValueType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'Array';
  if (typeof value === 'object') {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    if (typeof ctor === 'function' && ctor.name) return ctor.name;
    return 'Object';
  }
  return typeof value;
}
