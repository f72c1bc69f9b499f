import { hashIdentifier } from '../../common/utility/number.utils';
import { PageFacts, PageRecord } from '../../pages/interfaces/page.interface';
import { ContentPools } from './content-pools';

export interface PageHints {
  name?: string;
  industry?: string;
  followers?: number;
  employees?: number;
  headquarters?: string;
  description?: string;
}

export function pageUrl(baseUrl: string, identifier: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/company/${identifier}`;
}

export function displayNameFor(identifier: string): string {
  return identifier
    .split(/[-_.]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Plausible facts for a page nobody told us about: a known organization
 * from the pools, else counts derived from a stable hash of the identifier.
 */
export function defaultPageFacts(identifier: string, baseUrl: string, pools: ContentPools): PageFacts {
  const url = pageUrl(baseUrl, identifier);
  const known = pools.knownPages[identifier.toLowerCase()];
  if (known) {
    return { ...known, url, specialties: [...known.specialties], profilePictureUrl: null };
  }

  const hash = hashIdentifier(identifier);
  const name = displayNameFor(identifier);
  return {
    name,
    url,
    description: `${name} is a professional organization.`,
    industry: 'Technology',
    headquarters: 'USA',
    website: null,
    companySize: '51-200 employees',
    foundedYear: null,
    specialties: ['Business', 'Technology'],
    profilePictureUrl: null,
    followersCount: 10_000 + (hash % 100_000),
    employeesCount: 100 + (hash % 1_000),
  };
}

function storedFacts(page: PageRecord): PageFacts {
  return {
    name: page.name,
    url: page.url,
    description: page.description,
    industry: page.industry,
    headquarters: page.headquarters,
    website: page.website,
    companySize: page.companySize,
    foundedYear: page.foundedYear,
    specialties: [...page.specialties],
    profilePictureUrl: page.profilePictureUrl,
    followersCount: page.followersCount,
    employeesCount: page.employeesCount,
  };
}

/** Facts for the synthetic path: hints win over the stored page, which wins over defaults. */
export function resolveSyntheticFacts(
  defaults: PageFacts,
  stored: PageRecord | null,
  hints: PageHints = {},
): PageFacts {
  const base = stored ? storedFacts(stored) : defaults;
  return {
    ...base,
    name: hints.name ?? base.name,
    industry: hints.industry ?? base.industry,
    headquarters: hints.headquarters ?? base.headquarters,
    description: hints.description ?? base.description,
    followersCount: hints.followers ?? base.followersCount,
    employeesCount: hints.employees ?? base.employeesCount,
  };
}

/**
 * Live facts with the basic ones the source did not show taken from `fallback`.
 * A count of 0 means the count could not be read.
 */
export function completeLiveFacts(live: PageFacts, fallback: PageFacts): PageFacts {
  return {
    ...live,
    name: live.name.trim() === '' ? fallback.name : live.name,
    description: live.description ?? fallback.description,
    industry: live.industry ?? fallback.industry,
    headquarters: live.headquarters ?? fallback.headquarters,
    followersCount: live.followersCount > 0 ? live.followersCount : fallback.followersCount,
    employeesCount: live.employeesCount > 0 ? live.employeesCount : fallback.employeesCount,
  };
}
