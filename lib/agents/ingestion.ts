/**
 * Ingestion Agent - Collects new items from every registered source
 */

import { z } from 'zod';
import { BaseAgent } from './base';
import { Config } from '../config';
import type { SourceDescriptor } from '../types';
import type { FeedEntry, FeedTool } from '../tools/feed';
import type { TextFetcher } from '../tools/http';
import { extractArticleText } from '../tools/extract';
import type { ItemStore } from '../tools/item-store';
import { type VideoMeta, type VideoTool, watchUrl } from '../tools/video';
import { Logger, errorMessage, sleep, truncate } from '../utils';

const CandidateItemSchema = z.object({
  id: z.string().trim().min(1, 'id is required'),
  source: z.string().min(1, 'source is required'),
  title: z.string().trim().min(1, 'title is required'),
  url: z.string().url('url must be a valid URL'),
  raw_text: z.string(),
  summary: z.string(),
  audio_path: z.string().nullable(),
  published_at: z.string().datetime(),
});

export interface IngestionInput {
  limit_per_source: number;
}

export interface SourceReport {
  name: string;
  kind: SourceDescriptor['kind'];
  entries_seen: number;
  saved: number;
  skipped: number;
  failed: number;
  status: 'success' | 'failed';
  error?: string;
}

export interface IngestionOutput {
  sources: SourceReport[];
  items_saved: number;
  items_skipped: number;
  items_failed: number;
}

export interface IngestionDeps {
  store: ItemStore;
  feeds: FeedTool;
  pages: TextFetcher;
  videos: VideoTool;
  summaryLength?: number;
  sourceDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

type EntryOutcome = 'saved' | 'skipped';

/**
 * Platforms list entries newest first. Reverse that, then sort (stable) on
 * the publish time so insertion order follows publication order. Undated
 * entries sort as `now`, the timestamp they are stored with.
 */
export function oldestFirst<T extends { publishedAt?: Date }>(entries: readonly T[], now: Date): T[] {
  const time = (entry: T) => (entry.publishedAt ?? now).getTime();
  return [...entries].reverse().sort((a, b) => time(a) - time(b));
}

export class IngestionAgent extends BaseAgent<IngestionInput, IngestionOutput> {
  private store: ItemStore;
  private feeds: FeedTool;
  private pages: TextFetcher;
  private videos: VideoTool;
  private summaryLength: number;
  private sourceDelayMs: number;
  private wait: (ms: number) => Promise<void>;
  private now: () => Date;

  constructor(
    private readonly sources: readonly SourceDescriptor[],
    deps: IngestionDeps
  ) {
    super({ name: 'IngestionAgent' });

    this.store = deps.store;
    this.feeds = deps.feeds;
    this.pages = deps.pages;
    this.videos = deps.videos;
    this.summaryLength = deps.summaryLength ?? Config.SUMMARY_PREFIX_LENGTH;
    this.sourceDelayMs = deps.sourceDelayMs ?? Config.SOURCE_DELAY_MS;
    this.wait = deps.sleep ?? sleep;
    this.now = deps.now ?? (() => new Date());
  }

  protected async process(input: IngestionInput): Promise<IngestionOutput> {
    const reports: SourceReport[] = [];

    for (const [index, source] of this.sources.entries()) {
      Logger.info(`Processing source: ${source.name}`, { kind: source.kind, endpoint: source.endpoint });

      const report: SourceReport = {
        name: source.name,
        kind: source.kind,
        entries_seen: 0,
        saved: 0,
        skipped: 0,
        failed: 0,
        status: 'success',
      };

      try {
        if (source.kind === 'video-channel') {
          await this.collectChannel(source, input.limit_per_source, report);
        } else {
          await this.collectFeed(source, input.limit_per_source, report);
        }
      } catch (error) {
        report.status = 'failed';
        report.error = errorMessage(error);
        Logger.warn('Failed to collect source', { source: source.name, error: report.error });
      }

      Logger.info(`${source.name} processed`, {
        entries_seen: report.entries_seen,
        saved: report.saved,
        skipped: report.skipped,
        failed: report.failed,
      });
      reports.push(report);

      if (index < this.sources.length - 1 && this.sourceDelayMs > 0) {
        await this.wait(this.sourceDelayMs);
      }
    }

    return {
      sources: reports,
      items_saved: reports.reduce((sum, report) => sum + report.saved, 0),
      items_skipped: reports.reduce((sum, report) => sum + report.skipped, 0),
      items_failed: reports.reduce((sum, report) => sum + report.failed, 0),
    };
  }

  private async collectFeed(source: SourceDescriptor, limit: number, report: SourceReport): Promise<void> {
    const entries = oldestFirst((await this.feeds.parseFeed(source.endpoint)).slice(0, limit), this.now());
    report.entries_seen = entries.length;

    for (const entry of entries) {
      await this.runEntry(report, entry.title || entry.link, () => this.ingestFeedEntry(source, entry));
    }
  }

  private async collectChannel(source: SourceDescriptor, limit: number, report: SourceReport): Promise<void> {
    const videoIds = [...(await this.videos.listRecentVideoIds(source.endpoint, limit))].reverse();
    report.entries_seen = videoIds.length;

    for (const videoId of videoIds) {
      await this.runEntry(report, videoId, () => this.ingestVideo(source, videoId));
    }
  }

  /**
   * One entry's failure is counted and logged; the rest of the batch carries on.
   */
  private async runEntry(report: SourceReport, label: string, ingest: () => Promise<EntryOutcome>): Promise<void> {
    try {
      const outcome = await ingest();
      report[outcome]++;
    } catch (error) {
      report.failed++;
      Logger.warn('Failed to ingest entry', { source: report.name, entry: label, error: errorMessage(error) });
    }
  }

  private async ingestFeedEntry(source: SourceDescriptor, entry: FeedEntry): Promise<EntryOutcome> {
    const candidate = CandidateItemSchema.parse({
      id: entry.guid || entry.link,
      source: source.name,
      title: entry.title,
      url: entry.link,
      raw_text: entry.summary,
      summary: entry.summary,
      audio_path: entry.audioUrl ?? null,
      published_at: (entry.publishedAt ?? this.now()).toISOString(),
    });

    if (this.store.hasItem(candidate.id)) {
      Logger.debug('Skipping known item', { id: candidate.id });
      return 'skipped';
    }

    // Audio episodes and abstract feeds keep the feed-supplied text
    if (candidate.audio_path === null && source.fullText !== false) {
      try {
        const extracted = extractArticleText(await this.pages.fetchText(candidate.url));
        if (extracted) {
          candidate.raw_text = extracted;
        }
      } catch (error) {
        Logger.warn('Full-text fetch failed, keeping feed summary', {
          url: candidate.url,
          error: errorMessage(error),
        });
      }
    }

    return this.save(candidate);
  }

  private async ingestVideo(source: SourceDescriptor, videoId: string): Promise<EntryOutcome> {
    const id = `video:${videoId}`;
    if (this.store.hasItem(id)) {
      Logger.debug('Skipping known video', { id });
      return 'skipped';
    }

    let meta: VideoMeta = {};
    try {
      meta = await this.videos.fetchVideoMeta(videoId);
    } catch (error) {
      Logger.warn('Video page unavailable, using fallback title and timestamp', {
        videoId,
        error: errorMessage(error),
      });
    }

    const rawText = await this.videos.fetchTranscriptText(videoId);

    const candidate = CandidateItemSchema.parse({
      id,
      source: source.name,
      title: meta.title || `Video ${videoId}`,
      url: watchUrl(videoId),
      raw_text: rawText,
      summary: truncate(rawText, this.summaryLength),
      audio_path: null,
      published_at: (meta.publishedAt ?? this.now()).toISOString(),
    });

    return this.save(candidate);
  }

  private save(candidate: z.infer<typeof CandidateItemSchema>): EntryOutcome {
    if (!this.store.insertItem(candidate, this.now())) {
      Logger.debug('Item appeared concurrently, skipping', { id: candidate.id });
      return 'skipped';
    }
    Logger.info('Saved item', { id: candidate.id, title: candidate.title });
    return 'saved';
  }
}
