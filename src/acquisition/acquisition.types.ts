import {
  AcquisitionDepth,
  AcquisitionSource,
  PageRecord,
} from '../pages/interfaces/page.interface';
import { Tier } from './tier/tier-classifier';
import { PageHints } from './synthesis/default-page-facts';

export const IDENTIFIER_PATTERN = /^[a-z0-9][a-z0-9._-]{0,99}$/i;

export type AcquisitionState =
  | 'REQUESTED'
  | 'ACQUIRING'
  | 'ACQUIRED_LIVE'
  | 'ACQUIRED_SYNTHETIC'
  | 'PERSISTED'
  | 'FAILED';

export interface AcquisitionOptions {
  /** Live retrieval budget; LIVE_ACQUISITION_TIMEOUT_MS when omitted. */
  timeoutMs?: number;
  postsCount?: number;
  followersCount?: number;
  /** Defaults to a sample scaled to the page's employee count. */
  employeesCount?: number;
  commentsPerPost?: number;
  hints?: PageHints;
}

export interface AcquisitionResult {
  page: PageRecord;
  source: AcquisitionSource;
  depth: AcquisitionDepth;
  tier: Tier;
  postsCount: number;
  followersCount: number;
  employeesCount: number;
}

export interface AcquisitionRequest {
  identifier: string;
  depth: AcquisitionDepth;
  options?: AcquisitionOptions;
}

export type BatchAcquisitionOutcome =
  | { identifier: string; status: 'fulfilled'; result: AcquisitionResult }
  | { identifier: string; status: 'rejected'; error: { kind: string; message: string } };
