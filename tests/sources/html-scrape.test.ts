import { describe, it, expect } from 'vitest';
import { FetchError } from 'node-fetch';
import { JobFilter } from '../../src/filters/job-filter';
import { extractListings, PatternScrapeSource } from '../../src/sources/html-scrape';
import { indeedContract, linkedInContract } from '../../src/sources/scrape-contracts';
import { defaultFilters, FakeHttpClient, fixedClock, loadTextFixture } from '../helpers/fakes';

const filter = new JobFilter(defaultFilters, fixedClock);

describe('extractListings', () => {
  it('pulls LinkedIn cards out of the guest search markup', () => {
    const listings = extractListings(loadTextFixture('linkedin-search.html'), linkedInContract);

    expect(listings).toEqual([
      {
        title: 'Cloud Engineer',
        company: 'Skyline & Co',
        postingUrl: 'https://in.linkedin.com/jobs/view/cloud-engineer-at-skyline-4100000001',
      },
      {
        title: 'DevOps Engineer - AWS',
        company: 'Tern Systems',
        postingUrl: 'https://in.linkedin.com/jobs/view/devops-engineer-aws-at-tern-4100000002',
      },
      {
        title: 'Data Analyst',
        company: 'Figures Ltd',
        postingUrl: 'https://in.linkedin.com/jobs/view/data-analyst-at-figures-4100000003',
      },
    ]);
  });

  it('decodes JSON escapes in Indeed result data', () => {
    const listings = extractListings(loadTextFixture('indeed-search.html'), indeedContract);

    expect(listings).toEqual([
      {
        title: 'Cloud Support Engineer',
        company: 'Vega Cloud',
        postingUrl: 'https://in.indeed.com/viewjob?jk=a1b2c3d4e5f60718',
      },
      {
        title: 'Junior DevOps Engineer / SRE',
        company: 'Orion & Sons',
        postingUrl: 'https://in.indeed.com/viewjob?jk=0f1e2d3c4b5a6978',
      },
      {
        title: 'Accountant',
        company: 'Ledger Works',
        postingUrl: 'https://in.indeed.com/viewjob?jk=99aa88bb77cc66dd',
      },
    ]);
  });

  it('leaves backslashes in HTML captures alone', () => {
    const body = [
      '<a class="base-card__full-link" href="https://in.linkedin.com/jobs/view/5">',
      String.raw`<h3 class="base-search-card__title">Cloud \u0026 DevOps\n Engineer</h3>`,
      String.raw`<h4 class="base-search-card__subtitle">Back\\Slash Ltd</h4>`,
    ].join('\n');

    expect(extractListings(body, linkedInContract)).toEqual([
      {
        title: String.raw`Cloud \u0026 DevOps\n Engineer`,
        company: String.raw`Back\\Slash Ltd`,
        postingUrl: 'https://in.linkedin.com/jobs/view/5',
      },
    ]);
  });

  it('truncates to the shortest capture list', () => {
    const body = [
      '"displayTitle":"Cloud Engineer","company":"One","jobkey":"aaa111"',
      '"displayTitle":"DevOps Engineer","jobkey":"bbb222"',
    ].join('\n');

    expect(extractListings(body, indeedContract)).toEqual([
      { title: 'Cloud Engineer', company: 'One', postingUrl: 'https://in.indeed.com/viewjob?jk=aaa111' },
    ]);
  });

  it('returns nothing when the markup no longer matches', () => {
    expect(extractListings('<div class="jobs-list">redesigned</div>', linkedInContract)).toEqual([]);
  });
});

describe('PatternScrapeSource', () => {
  const keywords = ['cloud engineer', 'devops engineer'];

  it('searches once per keyword and keeps role matches', async () => {
    const http = new FakeHttpClient({
      [linkedInContract.searchUrl('cloud engineer', 'India')]: loadTextFixture('linkedin-search.html'),
      [linkedInContract.searchUrl('devops engineer', 'India')]: '<ul></ul>',
    });

    const source = new PatternScrapeSource(linkedInContract, http, filter, keywords, 'India');
    const jobs = await source.fetchJobs();

    expect(source.name).toBe('linkedin');
    expect(http.requests).toHaveLength(2);
    expect(jobs).toEqual([
      {
        title: 'Cloud Engineer',
        company: 'Skyline & Co',
        location: 'India',
        employmentType: 'Unknown',
        experienceLevel: 'Not specified',
        skills: 'N/A',
        postingUrl: 'https://in.linkedin.com/jobs/view/cloud-engineer-at-skyline-4100000001',
        sourceName: 'linkedin',
      },
      {
        title: 'DevOps Engineer - AWS',
        company: 'Tern Systems',
        location: 'India',
        employmentType: 'Unknown',
        experienceLevel: 'Not specified',
        skills: 'N/A',
        postingUrl: 'https://in.linkedin.com/jobs/view/devops-engineer-aws-at-tern-4100000002',
        sourceName: 'linkedin',
      },
    ]);
  });

  it('keeps later keywords running after one times out', async () => {
    const http = new FakeHttpClient({
      [indeedContract.searchUrl('cloud engineer', 'India')]: new FetchError(
        'network timeout at: https://in.indeed.com/jobs',
        'request-timeout'
      ),
      [indeedContract.searchUrl('devops engineer', 'India')]: loadTextFixture('indeed-search.html'),
    });

    const jobs = await new PatternScrapeSource(indeedContract, http, filter, keywords, 'India').fetchJobs();

    expect(jobs.map(job => job.title)).toEqual(['Cloud Support Engineer', 'Junior DevOps Engineer / SRE']);
  });
});

describe('scrape contracts', () => {
  it('builds search URLs with encoded parameters', () => {
    expect(linkedInContract.searchUrl('cloud engineer', 'India')).toBe(
      'https://www.linkedin.com/jobs-guest/jobs/api/seeMoreJobPostings/search?keywords=cloud+engineer&location=India&f_TPR=r172800'
    );
    expect(indeedContract.searchUrl('devops engineer', 'Kochi, Kerala')).toBe(
      'https://in.indeed.com/jobs?q=devops+engineer&l=Kochi%2C+Kerala&fromage=2'
    );
  });
});
