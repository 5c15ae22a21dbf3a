import type { Range, SceneParameters } from '@ridgeline/shared';

/** Top-level numeric scene fields */
export const NUMERIC_FIELDS = [
  'width',
  'height',
  'sunHeight',
  'sunSize',
  'fogHeight',
  'fogThickness',
  'mountainRangeCount',
  'mountainRoughness',
  'mountainPeakiness',
] as const;

type NumericField = (typeof NUMERIC_FIELDS)[number];

/** Upper limits keeping a single generation request bounded */
export const MAX_DIMENSION = 16384;
export const MAX_RANGE_COUNT = 64;
export const MAX_PEAKS = 500;

/** Partial parameters, with the nested ranges partial too */
export type SceneOverrides = Partial<Pick<SceneParameters, NumericField>> & {
  mountainPosition?: Partial<SceneParameters['mountainPosition']>;
  mountainPeaks?: Partial<Range>;
};

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Validates a complete set of scene parameters.
 * Returns an error message string if invalid, or null if valid.
 * Nothing is clamped: a bad silhouette parameter is always an error.
 */
export function validateSceneParameters(value: unknown): string | null {
  if (!isRecord(value)) {
    return 'Scene parameters must be an object';
  }

  for (const field of NUMERIC_FIELDS) {
    if (!isFiniteNumber(value[field])) {
      return `${field} is required and must be a finite number`;
    }
  }

  for (const field of ['width', 'height'] as const) {
    const n = value[field];
    if (!Number.isInteger(n) || Number(n) <= 0) {
      return `${field} must be a positive integer`;
    }
    if (Number(n) > MAX_DIMENSION) {
      return `${field} must not exceed ${MAX_DIMENSION} (got ${String(n)})`;
    }
  }

  const count = value.mountainRangeCount;
  if (!Number.isInteger(count) || Number(count) < 2) {
    return `mountainRangeCount must be an integer of at least 2 (got ${String(count)})`;
  }
  if (Number(count) > MAX_RANGE_COUNT) {
    return `mountainRangeCount must not exceed ${MAX_RANGE_COUNT} (got ${String(count)})`;
  }

  const position = value.mountainPosition;
  if (!isRecord(position) || !isFiniteNumber(position.start) || !isFiniteNumber(position.end)) {
    return 'mountainPosition must have numeric start and end';
  }

  const peaks = value.mountainPeaks;
  if (!isRecord(peaks) || !Number.isInteger(peaks.min) || !Number.isInteger(peaks.max)) {
    return 'mountainPeaks must have integer min and max';
  }
  if (Number(peaks.min) < 1) {
    return `mountainPeaks.min must be at least 1 (got ${String(peaks.min)})`;
  }
  if (Number(peaks.min) > Number(peaks.max)) {
    return `mountainPeaks.min (${String(peaks.min)}) must not exceed mountainPeaks.max (${String(peaks.max)})`;
  }
  if (Number(peaks.max) > MAX_PEAKS) {
    return `mountainPeaks.max must not exceed ${MAX_PEAKS} (got ${String(peaks.max)})`;
  }

  return null;
}

/** Merge overrides over a base; the result still needs validating */
export function applySceneOverrides(base: SceneParameters, overrides: SceneOverrides): SceneParameters {
  return {
    ...base,
    ...overrides,
    mountainPosition: { ...base.mountainPosition, ...overrides.mountainPosition },
    mountainPeaks: { ...base.mountainPeaks, ...overrides.mountainPeaks },
  };
}

/**
 * Reads overrides from a parsed JSON object shaped like SceneParameters.
 * Unknown keys are rejected.
 */
export function parseSceneOverrides(input: unknown): ParseResult<SceneOverrides> {
  if (!isRecord(input)) {
    return { ok: false, error: 'Scene overrides must be a JSON object' };
  }

  const overrides: SceneOverrides = {};
  for (const [key, raw] of Object.entries(input)) {
    if (isNumericField(key)) {
      if (!isFiniteNumber(raw)) return { ok: false, error: `${key} must be a finite number` };
      overrides[key] = raw;
    } else if (key === 'mountainPosition') {
      const pair = readPair(key, raw, 'start', 'end');
      if (!pair.ok) return pair;
      overrides.mountainPosition = {};
      if (pair.value.low !== undefined) overrides.mountainPosition.start = pair.value.low;
      if (pair.value.high !== undefined) overrides.mountainPosition.end = pair.value.high;
    } else if (key === 'mountainPeaks') {
      const pair = readPair(key, raw, 'min', 'max');
      if (!pair.ok) return pair;
      overrides.mountainPeaks = {};
      if (pair.value.low !== undefined) overrides.mountainPeaks.min = pair.value.low;
      if (pair.value.high !== undefined) overrides.mountainPeaks.max = pair.value.high;
    } else {
      return { ok: false, error: `Unknown scene parameter: ${key}` };
    }
  }
  return { ok: true, value: overrides };
}

/**
 * Reads overrides from an HTTP query. Values arrive as strings; nested
 * fields use the flat keys positionStart, positionEnd, peaksMin and peaksMax.
 * `seed` is left for the caller.
 */
export function parseQueryOverrides(query: Record<string, unknown>): ParseResult<SceneOverrides> {
  const overrides: SceneOverrides = {};
  for (const [key, raw] of Object.entries(query)) {
    if (key === 'seed') continue;
    if (typeof raw !== 'string') {
      return { ok: false, error: `${key} must be given once` };
    }
    const n = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(n)) {
      return { ok: false, error: `${key} must be a number` };
    }

    switch (key) {
      case 'positionStart':
        overrides.mountainPosition = { ...overrides.mountainPosition, start: n };
        break;
      case 'positionEnd':
        overrides.mountainPosition = { ...overrides.mountainPosition, end: n };
        break;
      case 'peaksMin':
        overrides.mountainPeaks = { ...overrides.mountainPeaks, min: n };
        break;
      case 'peaksMax':
        overrides.mountainPeaks = { ...overrides.mountainPeaks, max: n };
        break;
      default:
        if (!isNumericField(key)) {
          return { ok: false, error: `Unknown scene parameter: ${key}` };
        }
        overrides[key] = n;
    }
  }
  return { ok: true, value: overrides };
}

function isNumericField(key: string): key is NumericField {
  return NUMERIC_FIELDS.some((field) => field === key);
}

function readPair(
  key: string,
  raw: unknown,
  lowKey: string,
  highKey: string,
): ParseResult<{ low?: number; high?: number }> {
  if (!isRecord(raw)) {
    return { ok: false, error: `${key} must be an object` };
  }
  const pair: { low?: number; high?: number } = {};
  for (const [field, value] of Object.entries(raw)) {
    if (field !== lowKey && field !== highKey) {
      return { ok: false, error: `Unknown field ${key}.${field}` };
    }
    if (!isFiniteNumber(value)) {
      return { ok: false, error: `${key}.${field} must be a finite number` };
    }
    if (field === lowKey) pair.low = value;
    else pair.high = value;
  }
  return { ok: true, value: pair };
}
