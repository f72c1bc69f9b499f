import { Inject, Injectable, Logger } from '@nestjs/common';
import { describeError } from '../../common/errors/insights.errors';
import { truncateText } from '../../common/utility/number.utils';
import { AnalyticsSnapshot } from '../../analytics/analytics-aggregator';
import { PageRecord, PostRecord } from '../../pages/interfaces/page.interface';
import {
  TEXT_GENERATION_PROVIDER,
  TextGenerationProvider,
} from '../interfaces/ai-provider.interface';

export const SUMMARY_SYSTEM_PROMPT =
  'You are an expert business analyst providing concise, insightful summaries of organizations ' +
  'based on their professional network presence. Keep responses to 2-3 paragraphs.';

const numberFormat = new Intl.NumberFormat('en-US');

export function buildSummaryPrompt(
  page: PageRecord,
  snapshot: AnalyticsSnapshot,
  recentPosts: PostRecord[],
): string {
  const lines = [
    'Analyze this organization based on its professional network page:',
    '',
    `Organization: ${page.name}`,
    `Industry: ${page.industry ?? 'Not specified'}`,
    `Description: ${page.description ? truncateText(page.description, 300) : 'Not provided'}`,
    '',
    'Metrics:',
    `- Followers: ${numberFormat.format(page.followersCount)}`,
    `- Employees: ${numberFormat.format(page.employeesCount)}`,
    `- Average post engagement rate: ${snapshot.averageEngagementRate.toFixed(2)}%`,
    `- Posts analyzed: ${snapshot.totalPosts}`,
    '',
    `Specialties: ${page.specialties.length > 0 ? page.specialties.join(', ') : 'Not specified'}`,
  ];

  const topics = recentPosts.slice(0, 3).map((post) => `- ${truncateText(post.content, 100)}`);
  if (topics.length > 0) {
    lines.push('', 'Recent post topics:', ...topics);
  }

  lines.push(
    '',
    'Please provide:',
    '1. A brief assessment of the organization\'s industry position and market presence',
    '2. Analysis of its engagement and audience reach',
    '3. Insights about its content strategy and culture, based on the posts',
    '',
    'Keep the analysis concise and professional, suitable for business stakeholders.',
  );
  return lines.join('\n');
}

@Injectable()
export class InsightSummaryService {
  private readonly logger = new Logger(InsightSummaryService.name);

  constructor(
    @Inject(TEXT_GENERATION_PROVIDER) private readonly provider: TextGenerationProvider,
  ) {}

  /** Narrative for a page, or null when generation is disabled or fails. */
  async summarize(
    page: PageRecord,
    snapshot: AnalyticsSnapshot,
    recentPosts: PostRecord[],
  ): Promise<string | null> {
    if (!this.provider.enabled) {
      this.logger.debug(`Summary skipped for '${page.identifier}': text generation is disabled`);
      return null;
    }

    try {
      const text = await this.provider.generateText({
        prompt: buildSummaryPrompt(page, snapshot, recentPosts),
        systemPrompt: SUMMARY_SYSTEM_PROMPT,
        maxOutputTokens: 500,
        temperature: 0.7,
      });
      const summary = text.trim();
      if (summary.length === 0) {
        this.logger.warn(`Summary generation for '${page.identifier}' returned no text`);
        return null;
      }
      this.logger.log(`Generated summary for '${page.identifier}'`);
      return summary;
    } catch (error) {
      this.logger.warn(`Summary generation failed for '${page.identifier}': ${describeError(error)}`);
      return null;
    }
  }
}
