import {
  CommentRecord,
  FollowerSample,
  PageRecord,
  PersonProfileRecord,
  PostRecord,
} from '../interfaces/page.interface';
import {
  CommentEntity,
  FollowerSampleEntity,
  PageEntity,
  PersonProfileEntity,
  PostEntity,
} from './entities';

export function toPageRecord(entity: PageEntity): PageRecord {
  return {
    identifier: entity.identifier,
    name: entity.name,
    url: entity.url,
    description: entity.description,
    industry: entity.industry,
    headquarters: entity.headquarters,
    website: entity.website,
    companySize: entity.companySize,
    foundedYear: entity.foundedYear,
    specialties: entity.specialties ?? [],
    profilePictureUrl: entity.profilePictureUrl,
    followersCount: entity.followersCount,
    employeesCount: entity.employeesCount,
    lastSource: entity.lastSource,
    lastDepth: entity.lastDepth,
    lastAcquiredAt: entity.lastAcquiredAt,
    createdAt: entity.createdAt,
    updatedAt: entity.updatedAt,
  };
}

export function toPostRecord(entity: PostEntity): PostRecord {
  return {
    pageIdentifier: entity.pageIdentifier,
    postId: entity.postId,
    content: entity.content,
    imageUrl: entity.imageUrl,
    likesCount: entity.likesCount,
    commentsCount: entity.commentsCount,
    sharesCount: entity.sharesCount,
    viewsCount: entity.viewsCount,
    engagementRate: entity.engagementRate,
    postedAt: entity.postedAt,
  };
}

export function toCommentRecord(entity: CommentEntity): CommentRecord {
  return {
    commentId: entity.commentId,
    authorName: entity.authorName,
    content: entity.content,
    likesCount: entity.likesCount,
    createdAt: entity.createdAt,
  };
}

export function toPersonProfileRecord(entity: PersonProfileEntity): PersonProfileRecord {
  return {
    pageIdentifier: entity.pageIdentifier,
    profileId: entity.profileId,
    role: entity.role,
    name: entity.name,
    username: entity.username,
    headline: entity.headline,
    location: entity.location,
    connectionsCount: entity.connectionsCount,
    followersCount: entity.followersCount,
    currentPosition: entity.currentPosition,
    currentCompany: entity.currentCompany,
  };
}

export function toFollowerSample(entity: FollowerSampleEntity): FollowerSample {
  return { recordedAt: entity.recordedAt, followers: entity.followers };
}
