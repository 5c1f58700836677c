import { describe, it, expect } from 'vitest';
import { FetchError } from 'node-fetch';
import { loadConfig } from '../../src/config';
import { runJobAlerts } from '../../src/services/job-alert-run';
import type { JobSource } from '../../src/sources/base';
import { FakeChannel, FakeHttpClient, fixedClock, loadJsonFixture, makeJob } from '../helpers/fakes';

const structuredOnly = {
  ENABLE_REMOTEOK: 'false',
  ENABLE_WWR: 'false',
  ENABLE_LINKEDIN: 'false',
  ENABLE_INDEED: 'false',
};

function staticSource(name: string, count: number): JobSource {
  const jobs = Array.from({ length: count }, (_, i) =>
    makeJob({ title: `Cloud Engineer ${i + 1}`, postingUrl: `https://jobs.example.com/${name}/${i + 1}`, sourceName: name })
  );
  return { name, fetchJobs: async () => jobs };
}

describe('runJobAlerts', () => {
  it('aggregates, renders and delivers one digest', async () => {
    const http = new FakeHttpClient({
      'https://remotive.com/api/remote-jobs': loadJsonFixture('remotive-run.json'),
      'https://www.arbeitnow.com/api/job-board-api': new FetchError(
        'network timeout at: https://www.arbeitnow.com/api/job-board-api',
        'request-timeout'
      ),
    });
    const channel = new FakeChannel('900');

    const summary = await runJobAlerts(loadConfig(structuredOnly), { http, channel, clock: fixedClock });

    expect(http.requests).toEqual([
      'https://remotive.com/api/remote-jobs',
      'https://www.arbeitnow.com/api/job-board-api',
    ]);
    expect(summary.jobsFound).toBe(3);
    expect(summary.sourceStats).toEqual({
      remotive: { fetched: 3, errors: 0 },
      arbeitnow: { fetched: 0, errors: 0 },
    });
    expect(channel.calls[0]).toEqual({
      type: 'text',
      text: 'Daily Cloud / DevOps Job Alerts (Last 48 Hours)\nFound 3 matching jobs.',
    });
    expect(channel.pages).toHaveLength(1);
    expect(channel.pages[0].fragments).toHaveLength(9);
    expect(channel.pages[0].contextId).toBe('900');
    expect(summary.delivery).toEqual({ outcome: 'delivered', contextId: '900', pagesSent: 1, pagesFailed: 0 });
  });

  it('caps the digest and pages the rest', async () => {
    const channel = new FakeChannel();

    const summary = await runJobAlerts(loadConfig({}), {
      sources: [staticSource('first', 30), staticSource('second', 15)],
      channel,
    });

    expect(summary.jobsFound).toBe(45);
    expect(summary.jobsShown).toBe(40);
    expect(channel.calls[0]).toEqual({
      type: 'text',
      text: 'Daily Cloud / DevOps Job Alerts (Last 48 Hours)\nFound 45 matching jobs.\nShowing the first 40.',
    });
    expect(channel.pages.map(page => page.fragments.length)).toEqual([24, 24, 24, 24, 24]);
    const lastPage = channel.pages[4].fragments;
    expect(lastPage[lastPage.length - 2]).toEqual({
      kind: 'action',
      label: 'View Job',
      url: 'https://jobs.example.com/second/10',
    });
  });

  it('sends the empty notice when nothing matches', async () => {
    const channel = new FakeChannel();

    const summary = await runJobAlerts(loadConfig({}), { sources: [staticSource('quiet', 0)], channel });

    expect(channel.calls).toEqual([
      { type: 'text', text: 'No matching Cloud / DevOps jobs posted in the last 48 hours.' },
    ]);
    expect(summary.delivery.outcome).toBe('empty');
  });

  it('skips delivery when Telegram is not configured', async () => {
    const summary = await runJobAlerts(loadConfig({}), { sources: [staticSource('first', 2)] });

    expect(summary.jobsFound).toBe(2);
    expect(summary.delivery).toEqual({ outcome: 'skipped', pagesSent: 0, pagesFailed: 0 });
  });
});
