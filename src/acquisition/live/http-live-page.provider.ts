import { HttpService } from '@nestjs/axios';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import {
  AcquisitionFailedError,
  NotFoundError,
  describeError,
} from '../../common/errors/insights.errors';
import { pageUrl } from '../synthesis/default-page-facts';
import {
  LiveFetchOptions,
  LivePageProvider,
  LivePageSnapshot,
  LivePost,
} from './live-page-provider.interface';
import { parsePageHtml, parsePostsHtml } from './page-html.parser';

const SCRAPER_API_URL = 'https://api.scraperapi.com/';
const MAX_LIVE_POSTS = 50;
const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/**
 * Reads the public organization page. With SCRAPER_API_KEY set, requests go
 * through the rendering proxy, which runs the page's scripts first.
 */
@Injectable()
export class HttpLivePageProvider implements LivePageProvider {
  private readonly logger = new Logger(HttpLivePageProvider.name);
  private readonly baseUrl: string;
  private readonly scraperApiKey?: string;

  constructor(
    private readonly httpService: HttpService,
    config: ConfigService,
  ) {
    this.baseUrl = config.get<string>('LIVE_SOURCE_BASE_URL', 'https://www.linkedin.com');
    this.scraperApiKey = config.get<string>('SCRAPER_API_KEY');
  }

  async fetch(identifier: string, { depth, signal }: LiveFetchOptions): Promise<LivePageSnapshot> {
    const url = pageUrl(this.baseUrl, identifier);
    const html = await this.download(`${url}/about/`, identifier, signal);

    const facts = parsePageHtml(html, url);
    if (!facts) {
      throw new AcquisitionFailedError(`Live source served a sign-in wall for '${identifier}'`);
    }

    const posts = depth >= 2 ? await this.fetchPosts(`${url}/posts/`, identifier, signal) : [];
    this.logger.debug(
      `Live page '${identifier}': ${facts.followersCount} followers, ${posts.length} posts`,
    );
    return { facts, posts };
  }

  private async fetchPosts(url: string, identifier: string, signal: AbortSignal): Promise<LivePost[]> {
    try {
      return parsePostsHtml(await this.download(url, identifier, signal), MAX_LIVE_POSTS);
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      this.logger.warn(`Could not read live posts of '${identifier}': ${describeError(error)}`);
      return [];
    }
  }

  private async download(url: string, identifier: string, signal: AbortSignal): Promise<string> {
    const request = this.scraperApiKey
      ? this.httpService.get<string>(SCRAPER_API_URL, {
          signal,
          responseType: 'text',
          params: { api_key: this.scraperApiKey, url, render: 'true', country_code: 'us' },
        })
      : this.httpService.get<string>(url, {
          signal,
          responseType: 'text',
          headers: { 'User-Agent': BROWSER_USER_AGENT, Accept: 'text/html' },
          maxRedirects: 5,
        });

    try {
      const { data } = await firstValueFrom(request);
      return data;
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 404) {
        throw new NotFoundError(`Page '${identifier}' does not exist at the live source`, {
          cause: error,
        });
      }
      throw error;
    }
  }
}
