import type { FilterConfig } from '../config';

const HOUR_MS = 60 * 60 * 1000;

const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?))?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Parses an ISO-8601 timestamp. Offset-less and date-only values are read as UTC.
 * Returns undefined for anything else.
 */
export function parseIsoTimestamp(value: string): Date | undefined {
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) return undefined;

  const [, date, time = '00:00:00', offset = 'Z'] = match;
  const normalizedOffset = /^[+-]\d{4}$/.test(offset)
    ? `${offset.slice(0, 3)}:${offset.slice(3)}`
    : offset.toUpperCase();
  const parsed = new Date(`${date}T${time}${normalizedOffset}`);

  return isNaN(parsed.getTime()) ? undefined : parsed;
}

function containsAny(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some(keyword => lower.includes(keyword));
}

/**
 * Keyword and recency predicates over a fixed filter configuration.
 * Every predicate answers false when the data it needs is missing.
 */
export class JobFilter {
  constructor(
    private readonly filters: FilterConfig,
    private readonly clock: () => Date = () => new Date()
  ) {}

  matchesRole(title: string, description?: string): boolean {
    return containsAny(`${title} ${description ?? ''}`, this.filters.roleKeywords);
  }

  matchesLocation(location?: string): boolean {
    if (!location) return false;
    if (location.toLowerCase().includes('remote')) return true;
    return containsAny(location, this.filters.locationKeywords);
  }

  /**
   * Not used to drop jobs; sources may use it to label the experience level.
   */
  matchesExperience(text?: string): boolean {
    if (!text) return false;
    return containsAny(text, this.filters.experienceKeywords);
  }

  withinWindow(timestamp?: string): boolean {
    if (!timestamp) return false;

    const postedAt = parseIsoTimestamp(timestamp);
    if (!postedAt) return false;

    const age = this.clock().getTime() - postedAt.getTime();
    return age <= this.filters.windowHours * HOUR_MS;
  }
}
