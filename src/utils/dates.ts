/**
 * Timestamp helpers.
 *
 * Timestamps are stored in the UTC form produced by `Date#toISOString`
 * (`2024-03-01T09:30:00.000Z`); parsing and calendar checks live in the zod
 * schemas in utils/validation.
 */

/**
 * Current time as an ISO 8601 UTC timestamp
 */
export function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Seconds elapsed between two ISO timestamps (may be fractional)
 */
export function secondsBetween(start: string, end: string): number {
  return (Date.parse(end) - Date.parse(start)) / 1000;
}
