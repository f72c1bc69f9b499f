import * as cheerio from 'cheerio';
import {
  MAX_STORED_COUNT,
  parseCompactNumber,
  truncateText,
} from '../../common/utility/number.utils';
import { PageFacts } from '../../pages/interfaces/page.interface';
import { LivePost } from './live-page-provider.interface';

type CheerioRoot = ReturnType<typeof cheerio.load>;

const MAX_POST_LENGTH = 500;

const FOLLOWER_PATTERNS = [
  /(\d{1,3}(?:,\d{3})+)\s*followers/i,
  /(\d+(?:\.\d+)?[KMB])\s*followers/i,
  /(\d+)\s*followers/i,
  /"followerCount"\s*:\s*(\d+)/,
];

const EMPLOYEE_PATTERNS = [
  /(\d{1,3}(?:,\d{3})+|\d+(?:\.\d+)?[KMB]?)\s*employees/i,
  /"numberOfEmployees"\s*:\s*(\d+)/,
];

const METRIC_PATTERN = /(\d[\d,]*(?:\.\d+)?[KMB]?)/i;

function clean(text: string | undefined): string | null {
  const value = text?.replace(/\s+/g, ' ').trim();
  return value ? value : null;
}

function meta($: CheerioRoot, property: string): string | null {
  return clean(
    $(`meta[property="${property}"]`).attr('content') ?? $(`meta[name="${property}"]`).attr('content'),
  );
}

/** Value printed next to a label such as "Industry" in the about section. */
function labeled($: CheerioRoot, label: string): string | null {
  const term = $('dt, h3, span, div')
    .filter(
      (_, element) => $(element).children().length === 0 && $(element).text().trim() === label,
    )
    .first();
  if (term.length === 0) {
    return null;
  }
  return clean(term.next().text()) ?? clean(term.parent().next().text());
}

function readCount(raw: string): number {
  return Math.min(parseCompactNumber(raw), MAX_STORED_COUNT);
}

function firstCount(text: string, patterns: RegExp[]): number {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) {
      const count = readCount(match[1]);
      if (count > 0) {
        return count;
      }
    }
  }
  return 0;
}

function employeeCount($: CheerioRoot, html: string): number {
  const onPlatform = labeled($, 'Employees on LinkedIn');
  if (onPlatform) {
    const count = firstCount(onPlatform, [METRIC_PATTERN]);
    if (count > 0) return count;
  }
  // Ranges such as "501-1,000 employees" count as their upper bound.
  const range = /(\d[\d,]*)\s*-\s*(\d[\d,]*)\s*employees/i.exec(html);
  if (range) {
    return readCount(range[2]);
  }
  return firstCount(html, EMPLOYEE_PATTERNS);
}

/** True when the source served its sign-in wall instead of the page. */
export function isSignInWall(html: string): boolean {
  const $ = cheerio.load(html);
  const heading = clean($('h1').first().text());
  return heading === null || heading === 'Sign in' || $('form.authwall-join-form').length > 0;
}

/** Reads page facts from the public about page. Null on a sign-in wall. */
export function parsePageHtml(html: string, url: string): PageFacts | null {
  if (isSignInWall(html)) {
    return null;
  }
  const $ = cheerio.load(html);
  const name = clean($('h1').first().text()) ?? '';
  const founded = labeled($, 'Founded');
  const foundedYear = founded ? /(\d{4})/.exec(founded) : null;
  const specialties = labeled($, 'Specialties');

  return {
    name,
    url,
    description: meta($, 'og:description'),
    industry: labeled($, 'Industry'),
    headquarters: labeled($, 'Headquarters'),
    website: labeled($, 'Website'),
    companySize: labeled($, 'Company size'),
    foundedYear: foundedYear ? Number.parseInt(foundedYear[1], 10) : null,
    specialties: specialties
      ? specialties
          .split(/,| and /)
          .map((item) => item.trim())
          .filter((item) => item.length > 0)
      : [],
    profilePictureUrl: meta($, 'og:image'),
    followersCount:
      firstCount($('body').text(), FOLLOWER_PATTERNS) || firstCount(html, FOLLOWER_PATTERNS),
    employeesCount: employeeCount($, html),
  };
}

/** Count printed before a metric word, e.g. "1,204 likes" or "3.1K views". */
function metric(leafTexts: string[], name: string): number {
  const pattern = new RegExp(`${METRIC_PATTERN.source}\\s*${name}`, 'i');
  for (const text of leafTexts) {
    const count = firstCount(text, [pattern]);
    if (count > 0) {
      return count;
    }
  }
  return 0;
}

/** Reads posts from the public feed markup; posts without text are skipped. */
export function parsePostsHtml(html: string, limit: number): LivePost[] {
  const $ = cheerio.load(html);
  const posts: LivePost[] = [];

  $('[data-id]').each((_, element) => {
    if (posts.length >= limit) {
      return false;
    }
    const post = $(element);
    const content = clean(post.find('p, span').first().text());
    const postId = clean(post.attr('data-id'));
    if (!content || !postId) {
      return undefined;
    }
    const timestamp = post.find('time[datetime]').first().attr('datetime');
    const leafTexts = post
      .find('*')
      .filter((__, child) => $(child).children().length === 0)
      .map((__, child) => $(child).text())
      .get();
    const postedAt = timestamp ? new Date(timestamp) : null;

    posts.push({
      postId,
      content: truncateText(content, MAX_POST_LENGTH),
      imageUrl: clean(post.find('img').first().attr('src')),
      likesCount: metric(leafTexts, 'like'),
      commentsCount: metric(leafTexts, 'comment'),
      sharesCount: metric(leafTexts, 'share'),
      viewsCount: metric(leafTexts, 'view'),
      postedAt: postedAt && !Number.isNaN(postedAt.getTime()) ? postedAt : null,
    });
    return undefined;
  });

  return posts;
}
