import { AcquisitionDepth, PageFacts } from '../../pages/interfaces/page.interface';

export interface LivePost {
  postId: string;
  content: string;
  imageUrl: string | null;
  likesCount: number;
  commentsCount: number;
  sharesCount: number;
  viewsCount: number;
  /** Null when the source does not expose a publication time. */
  postedAt: Date | null;
}

export interface LivePageSnapshot {
  facts: PageFacts;
  /** Empty when depth is 1 or the source exposed no posts. */
  posts: LivePost[];
}

export interface LiveFetchOptions {
  depth: AcquisitionDepth;
  signal: AbortSignal;
}

/**
 * Retrieves a page from the public source. Implementations reject with
 * NotFoundError when the source says the page does not exist and with any
 * other error when retrieval fails; they must stop work once `signal` aborts.
 */
export interface LivePageProvider {
  fetch(identifier: string, options: LiveFetchOptions): Promise<LivePageSnapshot>;
}

export const LIVE_PAGE_PROVIDER = 'LIVE_PAGE_PROVIDER';
