/**
 * In-process stand-ins for the network, model and speech services
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import type { ItemStore } from '../lib/tools/item-store';
import type { TextFetcher } from '../lib/tools/http';
import { type GenerateOptions, type LanguageModel, parseStructured } from '../lib/tools/llm';
import type { SpeechSynthesizer } from '../lib/tools/tts';
import type { TranscriptSegment, TranscriptSource } from '../lib/tools/video';
import type { NewItem } from '../lib/types';
import type { RetryPolicy } from '../lib/utils/retry';

export const noSleep = async (): Promise<void> => {};

export function fastPolicy(maxAttempts = 3): RetryPolicy {
  return { maxAttempts, backoff: () => 0, sleep: noSleep };
}

export function makeTempDir(prefix = 'distillery-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export class FakeFetcher implements TextFetcher {
  readonly calls: string[] = [];

  constructor(private pages: Record<string, string | Error>) {}

  async fetchText(url: string): Promise<string> {
    this.calls.push(url);
    const page = this.pages[url];
    if (page === undefined) {
      throw new Error(`HTTP 404: no page for ${url}`);
    }
    if (page instanceof Error) {
      throw page;
    }
    return page;
  }
}

export class FakeTranscripts implements TranscriptSource {
  readonly calls: string[] = [];

  constructor(private transcripts: Record<string, string[]>) {}

  async fetchTranscript(videoId: string): Promise<TranscriptSegment[]> {
    this.calls.push(videoId);
    const lines = this.transcripts[videoId];
    if (!lines) {
      throw new Error(`Transcript is disabled for ${videoId}`);
    }
    return lines.map((text, index) => ({ text, offset: index * 1000, duration: 1000 }));
  }
}

type StructuredHandler = (prompt: string) => unknown;
type TextHandler = (prompt: string) => string;

export class FakeLanguageModel implements LanguageModel {
  readonly structuredPrompts: string[] = [];
  readonly textPrompts: string[] = [];
  readonly structuredOptions: Array<GenerateOptions | undefined> = [];

  constructor(
    private structured: StructuredHandler = () => ({ category: 'General', summary: 'A summary.' }),
    private text: TextHandler = () => 'Welcome to the daily update!'
  ) {}

  async generateStructured<T>(prompt: string, schema: z.ZodType<T>, options?: GenerateOptions): Promise<T> {
    this.structuredPrompts.push(prompt);
    this.structuredOptions.push(options);
    return parseStructured(JSON.stringify(this.structured(prompt)), schema);
  }

  async generateText(prompt: string): Promise<string> {
    this.textPrompts.push(prompt);
    return this.text(prompt);
  }
}

export class FakeSpeech implements SpeechSynthesizer {
  readonly scripts: string[] = [];

  constructor(private fail = false) {}

  async synthesize(text: string): Promise<Buffer> {
    this.scripts.push(text);
    if (this.fail) {
      throw new Error('speech service unavailable');
    }
    return Buffer.from('ID3-fake-audio');
  }
}

export function newItem(overrides: Partial<NewItem> & Pick<NewItem, 'id'>): NewItem {
  return {
    source: 'Test Feed',
    title: `Title ${overrides.id}`,
    url: `https://example.com/${encodeURIComponent(overrides.id)}`,
    raw_text: `Body of ${overrides.id}`,
    summary: `Blurb of ${overrides.id}`,
    audio_path: null,
    published_at: '2026-10-18T08:00:00.000Z',
    ...overrides,
  };
}

/**
 * Flag items as synthesized the only way the store allows: by committing a
 * report that covers them.
 */
export function markSynthesized(store: ItemStore, ids: string[]): void {
  store.commitReport(
    {
      generated_at: '2026-10-17T00:00:00.000Z',
      whats_new: '* earlier',
      feature_brief_summary: '* earlier',
      key_takeaways: '* earlier',
      audio_path: '/tmp/earlier.mp3',
    },
    ids
  );
}
