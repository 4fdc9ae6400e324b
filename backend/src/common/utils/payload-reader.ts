export type PayloadRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is PayloadRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function resolvePath(source: unknown, path: string): unknown {
  let current: unknown = source;

  for (const segment of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }

  return current;
}

/** First non-blank string (or finite number, stringified) found at any of the paths. */
export function readString(source: unknown, ...paths: string[]): string | undefined {
  for (const path of paths) {
    const value = resolvePath(source, path);
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }

  return undefined;
}

export function readNumber(source: unknown, ...paths: string[]): number | undefined {
  for (const path of paths) {
    const value = resolvePath(source, path);
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value;
    }
    if (typeof value === 'string' && value.trim().length > 0) {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }
  }

  return undefined;
}

export function readRecord(source: unknown, path: string): PayloadRecord | undefined {
  const value = resolvePath(source, path);
  return isRecord(value) ? value : undefined;
}

export function readArray(source: unknown, path: string): unknown[] {
  const value = resolvePath(source, path);
  return Array.isArray(value) ? value : [];
}
