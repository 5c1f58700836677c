import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { FilterConfig } from '../../src/config';
import { loadFilterConfig } from '../../src/config';
import type { HttpClient } from '../../src/utils/http';
import { HttpError } from '../../src/utils/http';
import type { NotificationChannel } from '../../src/services/notification-dispatcher';
import type { Fragment } from '../../src/services/presentation';
import type { JobRecord } from '../../src/types/job';

export const NOW = new Date('2026-10-19T12:00:00Z');
export const fixedClock = (): Date => NOW;

export const defaultFilters: FilterConfig = loadFilterConfig({});

export function fixturePath(name: string): string {
  return join(process.cwd(), 'tests', 'fixtures', name);
}

export function loadJsonFixture(name: string): unknown {
  const parsed: unknown = JSON.parse(readFileSync(fixturePath(name), 'utf-8'));
  return parsed;
}

export function loadTextFixture(name: string): string {
  return readFileSync(fixturePath(name), 'utf-8');
}

/**
 * Serves canned bodies by URL. Unknown URLs answer 404; Error values are thrown.
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: string[] = [];

  constructor(private readonly responses: Record<string, unknown> = {}) {}

  async getJson(url: string): Promise<unknown> {
    return this.respond(url);
  }

  async getText(url: string): Promise<string> {
    const body = this.respond(url);
    if (typeof body !== 'string') {
      throw new Error(`Fake response for ${url} is not text`);
    }
    return body;
  }

  private respond(url: string): unknown {
    this.requests.push(url);
    if (!(url in this.responses)) {
      throw new HttpError(404, url);
    }
    const response = this.responses[url];
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }
}

export type ChannelCall =
  | { type: 'text'; text: string }
  | { type: 'page'; fragments: readonly Fragment[]; contextId: string };

/**
 * Records every message in order. Failures are opt-in per call type.
 */
export class FakeChannel implements NotificationChannel {
  readonly calls: ChannelCall[] = [];
  failText = false;
  readonly failingPages = new Set<number>();
  private pageCount = 0;

  constructor(private readonly contextId: string = '1001') {}

  async sendText(text: string): Promise<string> {
    this.calls.push({ type: 'text', text });
    if (this.failText) {
      throw new Error('sendMessage rejected');
    }
    return this.contextId;
  }

  async sendFragments(fragments: readonly Fragment[], contextId: string): Promise<void> {
    const index = this.pageCount++;
    this.calls.push({ type: 'page', fragments, contextId });
    if (this.failingPages.has(index)) {
      throw new Error(`page ${index} rejected`);
    }
  }

  get pages(): Array<Extract<ChannelCall, { type: 'page' }>> {
    return this.calls.filter((call): call is Extract<ChannelCall, { type: 'page' }> => call.type === 'page');
  }
}

export function makeJob(overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    title: 'Cloud Engineer',
    company: 'Acme',
    location: 'Remote',
    employmentType: 'Remote',
    experienceLevel: 'Not specified',
    skills: 'aws',
    postingUrl: 'https://jobs.example.com/1',
    sourceName: 'test',
    ...overrides,
  };
}
