import contentPools from './data/content-pools.json';

export interface KnownPageFacts {
  name: string;
  description: string;
  industry: string;
  companySize: string;
  headquarters: string;
  foundedYear: number;
  website: string;
  specialties: string[];
  followersCount: number;
  employeesCount: number;
}

export interface ContentPools {
  postTemplates: string[];
  commentTemplates: string[];
  followerNames: string[];
  employeeNames: string[];
  positions: string[];
  companies: string[];
  locations: string[];
  knownPages: Record<string, KnownPageFacts>;
}

export const CONTENT_POOLS: ContentPools = contentPools;

export const CONTENT_POOLS_TOKEN = 'CONTENT_POOLS';
