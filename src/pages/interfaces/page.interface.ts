export type PersonRole = 'FOLLOWER' | 'EMPLOYEE';

export type AcquisitionSource = 'LIVE' | 'SYNTHETIC';

/** 1 = page only, 2 = page + posts, 3 = page + posts + people + extended analytics. */
export type AcquisitionDepth = 1 | 2 | 3;

export const ACQUISITION_DEPTHS: readonly AcquisitionDepth[] = [1, 2, 3];

/** Facts about an organization page, whichever path produced them. */
export interface PageFacts {
  name: string;
  url: string;
  description: string | null;
  industry: string | null;
  headquarters: string | null;
  website: string | null;
  companySize: string | null;
  foundedYear: number | null;
  specialties: string[];
  profilePictureUrl: string | null;
  followersCount: number;
  employeesCount: number;
}

export interface PageRecord extends PageFacts {
  identifier: string;
  lastSource: AcquisitionSource;
  lastDepth: AcquisitionDepth;
  lastAcquiredAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

export type PageWrite = Omit<PageRecord, 'createdAt' | 'updatedAt'>;

export interface CommentRecord {
  commentId: string;
  authorName: string;
  content: string;
  likesCount: number;
  createdAt: Date;
}

export interface PostRecord {
  pageIdentifier: string;
  postId: string;
  content: string;
  imageUrl: string | null;
  likesCount: number;
  commentsCount: number;
  sharesCount: number;
  viewsCount: number;
  engagementRate: number;
  postedAt: Date;
}

export interface PostWrite extends Omit<PostRecord, 'pageIdentifier'> {
  comments: CommentRecord[];
}

export interface PersonProfileRecord {
  pageIdentifier: string;
  profileId: string;
  role: PersonRole;
  name: string;
  username: string | null;
  headline: string | null;
  location: string | null;
  connectionsCount: number;
  followersCount: number;
  currentPosition: string | null;
  currentCompany: string | null;
}

export type PersonProfileWrite = Omit<PersonProfileRecord, 'pageIdentifier'>;

export interface FollowerSample {
  recordedAt: Date;
  followers: number;
}
