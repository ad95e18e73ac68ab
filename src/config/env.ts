/**
 * Env parsing helpers. All of them fall back instead of throwing, so a bad
 * value never stops the process from booting.
 */

export function readString(value: string | undefined, fallback: string): string {
  const v = value?.trim();
  return v ? v : fallback;
}

export function readBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const v = value.trim().toLowerCase();
  if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true;
  if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false;
  return fallback;
}

/** Positive integer, optionally bounded above. */
export function readPositiveInt(
  value: string | undefined,
  fallback: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const n = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isFinite(n) && n > 0 && n <= max ? n : fallback;
}

export function readChoice<T extends string>(
  value: string | undefined,
  choices: ReadonlyArray<T>,
  fallback: T,
): T {
  const v = value?.trim().toLowerCase();
  return choices.find((c) => c === v) ?? fallback;
}
