/**
 * Extraction contracts for search-result pages.
 *
 * Each pattern must be global and capture the value in group 1. Titles, companies
 * and links are paired by position, so a markup change on the origin usually shows
 * up as one list coming back short. Bump `version` whenever a pattern changes.
 */
export interface ScrapeContract {
  readonly name: string;
  readonly version: string;
  searchUrl(keyword: string, location: string): string;
  readonly patterns: {
    readonly title: RegExp;
    readonly company: RegExp;
    readonly link: RegExp;
  };
  /** json-string: captures are bodies of JSON string literals and carry JSON escapes */
  readonly captureFormat: 'html' | 'json-string';
  toPostingUrl(captured: string): string;
}

export const linkedInContract: ScrapeContract = {
  name: 'linkedin',
  version: '2024-06',
  searchUrl(keyword, location) {
    const params = new URLSearchParams({
      keywords: keyword,
      location,
      // posted in the last 48 hours
      f_TPR: 'r172800',
    });
    return `https://www.linkedin.com/jobs-guest/jobs/api/seeMoreJobPostings/search?${params.toString()}`;
  },
  patterns: {
    title: /<h3 class="base-search-card__title">([\s\S]*?)<\/h3>/g,
    company: /<h4 class="base-search-card__subtitle">([\s\S]*?)<\/h4>/g,
    link: /<a class="base-card__full-link[^"]*"\s+href="([^"]+)"/g,
  },
  captureFormat: 'html',
  toPostingUrl(captured) {
    // drop tracking parameters
    return captured.split('?')[0];
  },
};

export const indeedContract: ScrapeContract = {
  name: 'indeed',
  version: '2024-06',
  searchUrl(keyword, location) {
    const params = new URLSearchParams({ q: keyword, l: location, fromage: '2' });
    return `https://in.indeed.com/jobs?${params.toString()}`;
  },
  patterns: {
    title: /"displayTitle":"((?:[^"\\]|\\.)*)"/g,
    company: /"company":"((?:[^"\\]|\\.)*)"/g,
    link: /"jobkey":"([0-9a-zA-Z]+)"/g,
  },
  captureFormat: 'json-string',
  toPostingUrl(captured) {
    return `https://in.indeed.com/viewjob?jk=${encodeURIComponent(captured)}`;
  },
};
