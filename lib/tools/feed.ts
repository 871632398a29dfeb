/**
 * Feed Tool - Parse RSS/Atom feeds into normalized entries
 */

import Parser from 'rss-parser';
import type { TextFetcher } from './http';
import { Logger, cleanText, parseDate } from '../utils';

export interface FeedEntry {
  guid?: string;
  title: string;
  link: string;
  publishedAt?: Date;
  summary: string;
  audioUrl?: string;
}

// Atom entries expose their identifier as `id` rather than `guid`
type AtomFields = { id?: string };

export class FeedTool {
  private parser: Parser<Record<string, unknown>, AtomFields>;

  constructor(private fetcher: TextFetcher) {
    this.parser = new Parser<Record<string, unknown>, AtomFields>();
  }

  /**
   * Fetch and parse a feed. Entries keep the order the publisher lists them in,
   * which for every feed we consume is newest first.
   */
  async parseFeed(url: string): Promise<FeedEntry[]> {
    Logger.debug('Parsing feed', { url });

    const xml = await this.fetcher.fetchText(url);
    return this.parseXml(xml);
  }

  async parseXml(xml: string): Promise<FeedEntry[]> {
    const feed = await this.parser.parseString(xml);

    return (feed.items || []).map(item => {
      const enclosure = item.enclosure;
      const isAudio = Boolean(enclosure?.url && enclosure.type?.includes('audio'));

      return {
        guid: item.guid || (typeof item.id === 'string' ? item.id : undefined),
        title: cleanText(item.title),
        link: (item.link || '').trim(),
        publishedAt: parseDate(item.isoDate) ?? parseDate(item.pubDate),
        summary: cleanText(item.contentSnippet ?? item.summary),
        audioUrl: isAudio ? enclosure?.url : undefined,
      };
    });
  }
}
