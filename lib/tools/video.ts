/**
 * Video Tool - Recent uploads, page metadata and transcripts for video channels
 */

import { load } from 'cheerio';
import type { TextFetcher } from './http';
import { Logger, cleanText, parseDate } from '../utils';

export interface TranscriptSegment {
  text: string;
  offset?: number;
  duration?: number;
}

export interface TranscriptSource {
  fetchTranscript(videoId: string): Promise<TranscriptSegment[]>;
}

export interface VideoMeta {
  title?: string;
  publishedAt?: Date;
}

const VIDEO_ID_PATTERN = /"videoId":"([^"]+)"/g;
const PUBLISH_DATE_PATTERN = /"publishDate":"([^"]+)"/;

/**
 * Pull video identifiers out of a channel listing page, deduplicated and in
 * the order the platform presents them (newest first).
 */
export function extractVideoIds(html: string, limit: number): string[] {
  const unique: string[] = [];

  for (const match of html.matchAll(VIDEO_ID_PATTERN)) {
    const videoId = match[1];
    if (!unique.includes(videoId)) {
      unique.push(videoId);
    }
  }

  return unique.slice(0, limit);
}

export function parseVideoPage(html: string): VideoMeta {
  const $ = load(html);

  const ogTitle = $('meta[property="og:title"]').attr('content');
  const pageTitle = $('title').first().text().replace(/\s+-\s+YouTube\s*$/, '');
  const title = cleanText(ogTitle || pageTitle) || undefined;

  const publishDate =
    html.match(PUBLISH_DATE_PATTERN)?.[1] ??
    $('meta[itemprop="datePublished"]').attr('content') ??
    $('meta[itemprop="uploadDate"]').attr('content');

  return { title, publishedAt: parseDate(publishDate) };
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
}

export class VideoTool {
  constructor(
    private fetcher: TextFetcher,
    private transcripts: TranscriptSource
  ) {}

  async listRecentVideoIds(channelUrl: string, limit: number): Promise<string[]> {
    const html = await this.fetcher.fetchText(channelUrl);
    const videoIds = extractVideoIds(html, limit);
    Logger.debug('Found channel videos', { channelUrl, count: videoIds.length });
    return videoIds;
  }

  async fetchVideoMeta(videoId: string): Promise<VideoMeta> {
    const html = await this.fetcher.fetchText(watchUrl(videoId));
    return parseVideoPage(html);
  }

  async fetchTranscriptText(videoId: string): Promise<string> {
    const segments = await this.transcripts.fetchTranscript(videoId);
    return cleanText(segments.map(segment => segment.text).join(' '));
  }
}
