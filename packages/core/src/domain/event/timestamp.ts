const ISO_PATTERN =
  /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:[+-]\d{2}:\d{2})?)?$/;

/** The fallback instant for anything unparsable; sorts before every real timestamp. */
export function epochOrigin(): Date {
  return new Date(0);
}

function normaliseIso(value: string): string {
  let candidate = value.trim();
  if (candidate.endsWith('Z')) candidate = `${candidate.slice(0, -1)}+00:00`;
  candidate = candidate.replace(/^(\d{4}-\d{2}-\d{2}) (\d)/, '$1T$2');
  candidate = candidate.replace(/([+-]\d{2})(\d{2})$/, '$1:$2');
  // A time without an offset is read as UTC, never host-local.
  if (candidate.includes('T') && !/[+-]\d{2}:\d{2}$/.test(candidate)) candidate += '+00:00';
  // Date only keeps millisecond precision.
  return candidate.replace(/(\.\d{3})\d+/, '$1');
}

/**
 * Parses epoch seconds or an ISO-8601 string. Never throws: anything else
 * resolves to the epoch origin.
 */
export function parseTimestamp(value: unknown): Date {
  if (typeof value === 'number' && Number.isFinite(value)) {
    const date = new Date(value * 1000);
    return Number.isNaN(date.getTime()) ? epochOrigin() : date;
  }
  if (typeof value === 'string') {
    const candidate = normaliseIso(value);
    if (ISO_PATTERN.test(candidate)) {
      const date = new Date(candidate);
      if (!Number.isNaN(date.getTime())) return date;
    }
  }
  return epochOrigin();
}
