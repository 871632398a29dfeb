/**
 * Tests for Ingestion Agent
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { IngestionAgent, type IngestionDeps, oldestFirst } from '../lib/agents/ingestion';
import { FeedTool } from '../lib/tools/feed';
import { ItemStore } from '../lib/tools/item-store';
import { VideoTool, watchUrl } from '../lib/tools/video';
import type { SourceDescriptor } from '../lib/types';
import { FakeFetcher, FakeTranscripts } from './helpers';

const NOW = new Date('2026-10-18T12:00:00.000Z');

function rss(items: string): string {
  return `<?xml version="1.0"?><rss version="2.0"><channel><title>t</title><link>https://example.com</link><description>d</description>${items}</channel></rss>`;
}

const NEWS_FEED = rss(`
  <item>
    <title>Second story</title><link>https://news.example.com/second</link><guid>story-2</guid>
    <pubDate>Sun, 18 Oct 2026 09:00:00 GMT</pubDate><description>Second blurb</description>
  </item>
  <item>
    <title>First story</title><link>https://news.example.com/first</link><guid>story-1</guid>
    <pubDate>Sat, 17 Oct 2026 09:00:00 GMT</pubDate><description>First blurb</description>
  </item>`);

const ABSTRACT_FEED = rss(`
  <item>
    <title>A paper</title><link>https://papers.example.org/abs/1</link>
    <pubDate>Sun, 18 Oct 2026 07:00:00 GMT</pubDate><description>We propose a method.</description>
  </item>
  <item>
    <link>https://papers.example.org/abs/untitled</link><guid>untitled</guid>
    <pubDate>Sun, 18 Oct 2026 06:00:00 GMT</pubDate><description>No title here.</description>
  </item>`);

const PODCAST_FEED = rss(`
  <item>
    <title>Episode one</title><link>https://pod.example.com/ep-1</link><guid>ep-1</guid>
    <pubDate>Sat, 17 Oct 2026 20:00:00 GMT</pubDate><description>Show notes</description>
    <enclosure url="https://cdn.example.com/ep-1.mp3" length="1" type="audio/mpeg"/>
  </item>`);

const CHANNEL_PAGE =
  '<script>var ytInitialData = {"a":[{"videoId":"NEW"},{"videoId":"DEAD"},{"videoId":"OLD"}]};</script>';

const SOURCES: SourceDescriptor[] = [
  { name: 'News', endpoint: 'https://news.example.com/feed', kind: 'feed' },
  { name: 'Papers', endpoint: 'https://papers.example.org/rss', kind: 'feed', fullText: false },
  { name: 'Podcast', endpoint: 'https://pod.example.com/rss', kind: 'feed' },
  { name: 'Broken', endpoint: 'https://broken.example.com/rss', kind: 'feed' },
  { name: 'Briefing', endpoint: 'https://video.example.com/@brief/videos', kind: 'video-channel', liveBriefing: true },
];

describe('oldestFirst', () => {
  it('should reverse entries without timestamps', () => {
    const entries = [3, 2, 1].map(n => ({ n, publishedAt: undefined }));
    expect(oldestFirst(entries, NOW).map(entry => entry.n)).toEqual([1, 2, 3]);
  });

  it('should sort by timestamp when every entry has one', () => {
    const entries = [
      { n: 1, publishedAt: new Date('2026-10-17T00:00:00Z') },
      { n: 2, publishedAt: new Date('2026-10-18T00:00:00Z') },
      { n: 3, publishedAt: new Date('2026-10-16T00:00:00Z') },
    ];
    expect(oldestFirst(entries, NOW).map(entry => entry.n)).toEqual([3, 1, 2]);
  });

  it('should place undated entries at the current time', () => {
    const entries: { name: string; publishedAt?: Date }[] = [
      { name: 'old', publishedAt: new Date('2026-10-01T00:00:00Z') },
      { name: 'new', publishedAt: new Date('2026-10-05T00:00:00Z') },
      { name: 'undated' },
    ];
    expect(oldestFirst(entries, NOW).map(entry => entry.name)).toEqual(['old', 'new', 'undated']);

    const future = { name: 'future', publishedAt: new Date('2026-10-19T00:00:00Z') };
    expect(oldestFirst([future, ...entries], NOW).map(entry => entry.name)).toEqual([
      'old',
      'new',
      'undated',
      'future',
    ]);
  });
});

describe('IngestionAgent', () => {
  let store: ItemStore;
  let fetcher: FakeFetcher;
  let sleeps: number[];
  let deps: IngestionDeps;

  beforeEach(() => {
    store = ItemStore.open(':memory:');
    fetcher = new FakeFetcher({
      'https://news.example.com/feed': NEWS_FEED,
      'https://news.example.com/second': '<html><body><article><p>Full story two.</p></article></body></html>',
      'https://news.example.com/first': new Error('HTTP 403: Forbidden'),
      'https://papers.example.org/rss': ABSTRACT_FEED,
      'https://pod.example.com/rss': PODCAST_FEED,
      'https://video.example.com/@brief/videos': CHANNEL_PAGE,
      [watchUrl('NEW')]:
        '<html><head><meta property="og:title" content="Morning brief"></head>' +
        '<body><script>{"publishDate":"2026-10-18T10:00:00Z"}</script></body></html>',
    });
    const transcripts = new FakeTranscripts({
      NEW: ['today in', 'models'],
      OLD: ['old clip', 'transcript'],
    });
    sleeps = [];
    deps = {
      store,
      feeds: new FeedTool(fetcher),
      pages: fetcher,
      videos: new VideoTool(fetcher, transcripts),
      summaryLength: 8,
      sourceDelayMs: 250,
      sleep: async ms => {
        sleeps.push(ms);
      },
      now: () => NOW,
    };
  });

  afterEach(() => {
    store.close();
  });

  it('should collect every source and report per-source outcomes', async () => {
    const result = await new IngestionAgent(SOURCES, deps).execute('run-1', { limit_per_source: 5 });

    expect(result.errors).toEqual([]);
    expect(result.output).toMatchObject({ items_saved: 6, items_skipped: 0, items_failed: 2 });
    expect(result.output?.sources.map(source => [source.name, source.status, source.saved, source.failed])).toEqual([
      ['News', 'success', 2, 0],
      ['Papers', 'success', 1, 1],
      ['Podcast', 'success', 1, 0],
      ['Broken', 'failed', 0, 0],
      ['Briefing', 'success', 2, 1],
    ]);
    expect(sleeps).toEqual([250, 250, 250, 250]);
  });

  it('should insert entries oldest first', async () => {
    await new IngestionAgent(SOURCES, deps).execute('run-1', { limit_per_source: 5 });

    const order = ['story-1', 'story-2', 'https://papers.example.org/abs/1', 'ep-1', 'video:OLD', 'video:NEW'];
    expect(order.map(id => store.getItem(id)?.insertion_sequence)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('should replace feed text with the page text when it can be fetched', async () => {
    await new IngestionAgent(SOURCES, deps).execute('run-1', { limit_per_source: 5 });

    expect(store.getItem('story-2')).toMatchObject({
      raw_text: 'Full story two.',
      summary: 'Second blurb',
      published_at: '2026-10-18T09:00:00.000Z',
      ingested_at: NOW.toISOString(),
    });
    expect(store.getItem('story-1')?.raw_text).toBe('First blurb');
  });

  it('should keep feed text for abstract feeds and audio episodes', async () => {
    await new IngestionAgent(SOURCES, deps).execute('run-1', { limit_per_source: 5 });

    expect(store.getItem('https://papers.example.org/abs/1')?.raw_text).toBe('We propose a method.');
    expect(store.getItem('ep-1')).toMatchObject({
      raw_text: 'Show notes',
      audio_path: 'https://cdn.example.com/ep-1.mp3',
    });
    expect(fetcher.calls).not.toContain('https://papers.example.org/abs/1');
    expect(fetcher.calls).not.toContain('https://pod.example.com/ep-1');
  });

  it('should store video transcripts with fallback metadata', async () => {
    await new IngestionAgent(SOURCES, deps).execute('run-1', { limit_per_source: 5 });

    expect(store.getItem('video:NEW')).toMatchObject({
      title: 'Morning brief',
      url: 'https://www.youtube.com/watch?v=NEW',
      raw_text: 'today in models',
      summary: 'today in...',
      published_at: '2026-10-18T10:00:00.000Z',
    });
    expect(store.getItem('video:OLD')).toMatchObject({
      title: 'Video OLD',
      summary: 'old clip...',
      published_at: NOW.toISOString(),
    });
    expect(store.hasItem('video:DEAD')).toBe(false);
  });

  it('should skip everything already stored on a second run', async () => {
    const agent = new IngestionAgent(SOURCES, deps);
    await agent.execute('run-1', { limit_per_source: 5 });
    const second = await agent.execute('run-2', { limit_per_source: 5 });

    expect(second.output).toMatchObject({ items_saved: 0, items_skipped: 5, items_failed: 2 });
    expect(store.countItems()).toBe(6);
  });

  it('should respect the per-source limit', async () => {
    const result = await new IngestionAgent([SOURCES[0]], deps).execute('run-1', { limit_per_source: 1 });

    expect(result.output?.items_saved).toBe(1);
    expect(store.hasItem('story-2')).toBe(true);
    expect(store.hasItem('story-1')).toBe(false);
    expect(sleeps).toEqual([]);
  });
});
