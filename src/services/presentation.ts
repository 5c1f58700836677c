import type { EmploymentType, JobRecord } from '../types/job';
import { truncate } from '../utils/text';

export interface SummaryFragment {
  kind: 'summary';
  title: string;
  company: string;
  location: string;
  employmentType: EmploymentType;
  experience: string;
  skills: string;
  source: string;
}

export interface ActionFragment {
  kind: 'action';
  label: string;
  url: string;
}

export interface DividerFragment {
  kind: 'divider';
}

export type Fragment = SummaryFragment | ActionFragment | DividerFragment;

/** summary, action, divider */
export const FRAGMENTS_PER_JOB = 3;

export interface PresentationOptions {
  maxJobs: number;
  alertLabel: string;
  windowHours: number;
}

const MAX_TITLE = 120;
const MAX_FIELD = 80;
const MAX_SKILLS = 150;

/**
 * Turns job records into channel-neutral fragments and digest texts
 */
export class PresentationBuilder {
  constructor(private readonly options: PresentationOptions) {}

  buildFragments(jobs: readonly JobRecord[]): Fragment[] {
    const fragments: Fragment[] = [];

    for (const job of jobs.slice(0, this.options.maxJobs)) {
      fragments.push(
        {
          kind: 'summary',
          title: truncate(job.title || 'Untitled', MAX_TITLE),
          company: truncate(job.company, MAX_FIELD),
          location: truncate(job.location || 'Not specified', MAX_FIELD),
          employmentType: job.employmentType,
          experience: truncate(job.experienceLevel, MAX_FIELD),
          skills: truncate(job.skills, MAX_SKILLS),
          source: job.sourceName,
        },
        { kind: 'action', label: 'View Job', url: job.postingUrl },
        { kind: 'divider' }
      );
    }

    return fragments;
  }

  formatHeader(total: number): string {
    const { alertLabel, windowHours, maxJobs } = this.options;
    const lines = [
      `Daily ${alertLabel} Job Alerts (Last ${windowHours} Hours)`,
      `Found ${total} matching job${total === 1 ? '' : 's'}.`,
    ];
    if (total > maxJobs) {
      lines.push(`Showing the first ${maxJobs}.`);
    }
    return lines.join('\n');
  }

  formatEmpty(): string {
    return `No matching ${this.options.alertLabel} jobs posted in the last ${this.options.windowHours} hours.`;
  }
}
