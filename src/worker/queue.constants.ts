import { Job } from 'bullmq';

export const PAGE_REFRESH_QUEUE = 'page-refresh-queue';
export const REFRESH_PAGE_JOB = 'refresh-page';

export interface RefreshPageJobData {
  identifier: string;
}

/** The parts of a refresh job the processor reads. */
export type RefreshPageJob = Pick<Job<RefreshPageJobData>, 'name' | 'data'>;
