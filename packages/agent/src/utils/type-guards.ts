/**
 * Narrowing helpers for untyped JSON coming back from the device API and
 * from disk.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value)
  );
}

export function readString(
  data: Record<string, unknown>,
  key: string
): string | null {
  const value = data[key];
  if (typeof value === 'string') {
    return value;
  }
  return null;
}

/** Finite numbers only; `NaN` and non-numbers read as null. */
export function readNumber(
  data: Record<string, unknown>,
  key: string
): number | null {
  const value = data[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  return null;
}

export function readRecord(
  data: Record<string, unknown>,
  key: string
): Record<string, unknown> | null {
  const value = data[key];
  return isRecord(value) ? value : null;
}

/** Array entries that are plain objects; anything else in the array is dropped. */
export function readRecordArray(
  data: Record<string, unknown>,
  key: string
): Record<string, unknown>[] {
  const value = data[key];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isRecord);
}

/** Numeric entries of a series; gaps (null or non-numeric) are skipped. */
export function readNumberSeries(
  data: Record<string, unknown>,
  key: string
): number[] {
  const value = data[key];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(
    (entry): entry is number => typeof entry === 'number' && Number.isFinite(entry)
  );
}
