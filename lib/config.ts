/**
 * Configuration management for the distillation pipeline
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { SourceDescriptor } from './types';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function parseLogLevel(value: string | undefined): LogLevel {
  const match = LOG_LEVELS.find(level => level === value);
  return match ?? 'info';
}

const SourceDescriptorSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  endpoint: z.string().url('endpoint must be a valid URL'),
  kind: z.enum(['feed', 'video-channel']),
  fullText: z.boolean().optional(),
  liveBriefing: z.boolean().optional(),
});

const SourceRegistrySchema = z
  .array(SourceDescriptorSchema)
  .refine(sources => sources.filter(source => source.liveBriefing).length <= 1, {
    message: 'At most one source may be marked as the live briefing',
  });

export class Config {
  // OpenAI
  static OPENAI_API_KEY = process.env.OPENAI_API_KEY || '';
  static LLM_MODEL = process.env.LLM_MODEL || 'gpt-4o-mini';
  static TTS_MODEL = process.env.TTS_MODEL || 'tts-1';
  static TTS_VOICE = process.env.TTS_VOICE || 'nova';
  static LLM_TIMEOUT_MS = parseInt(process.env.LLM_TIMEOUT_MS || '60000', 10);

  // Storage
  static DB_PATH = process.env.DB_PATH || path.join('data', 'items.db');
  static RUN_GUARD_PATH = process.env.RUN_GUARD_PATH || path.join('data', 'distillation.lock');
  static AUDIO_DIR = process.env.AUDIO_DIR || path.join('data', 'audio');
  static SOURCES_PATH = process.env.SOURCES_PATH || path.join('config', 'sources.json');

  // Ingestion
  static MAX_ENTRIES_PER_SOURCE = parseInt(process.env.MAX_ENTRIES_PER_SOURCE || '5', 10);
  static SUMMARY_PREFIX_LENGTH = parseInt(process.env.SUMMARY_PREFIX_LENGTH || '500', 10);
  static FETCH_TIMEOUT_MS = parseInt(process.env.FETCH_TIMEOUT_MS || '15000', 10);
  static SOURCE_DELAY_MS = parseInt(process.env.SOURCE_DELAY_MS || '1000', 10);

  // Synthesis
  static SHOW_NAME = process.env.SHOW_NAME || 'The Daily Distillate';
  static LIVE_BRIEFING_WINDOW_HOURS = parseInt(process.env.LIVE_BRIEFING_WINDOW_HOURS || '24', 10);
  static SCRIPT_TARGET_WORDS = parseInt(process.env.SCRIPT_TARGET_WORDS || '450', 10);

  // Operational
  static LOG_LEVEL: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

  static resolvePath(candidate: string): string {
    return path.isAbsolute(candidate) ? candidate : path.join(process.cwd(), candidate);
  }

  /**
   * Load and validate the source registry. The result is frozen so the
   * collector cannot mutate it between sources.
   */
  static loadSources(sourcesPath: string = Config.SOURCES_PATH): readonly SourceDescriptor[] {
    const raw = fs.readFileSync(Config.resolvePath(sourcesPath), 'utf-8');
    return Config.parseSources(JSON.parse(raw));
  }

  static parseSources(value: unknown): readonly SourceDescriptor[] {
    const parsed = SourceRegistrySchema.parse(value);
    return Object.freeze(parsed.map(source => Object.freeze({ ...source })));
  }

  static liveBriefingSource(sources: readonly SourceDescriptor[]): string | undefined {
    return sources.find(source => source.liveBriefing)?.name;
  }
}
