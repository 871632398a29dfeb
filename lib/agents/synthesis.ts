/**
 * Synthesis Agent - Folds the eligible backlog into one report plus audio
 *
 * Either a report row exists and every batch item is flagged, or nothing
 * changed and the next run sees the same batch again.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { BaseAgent } from './base';
import { ReportSchema, buildCorpora, buildReportPrompt, buildScriptPrompt } from './prompts';
import { Config } from '../config';
import type { Item, Report } from '../types';
import type { ItemStore } from '../tools/item-store';
import type { LanguageModel } from '../tools/llm';
import type { SpeechSynthesizer } from '../tools/tts';
import { Clock, Logger, errorMessage } from '../utils';
import { MODEL_RETRY_POLICY, type RetryPolicy, retryWithPolicy } from '../utils/retry';

export interface SynthesisInput {
  live_briefing_source?: string;
  window_hours: number;
}

export interface SynthesisOutput {
  status: 'no_op' | 'committed' | 'rolled_back';
  batch_size: number;
  item_ids: string[];
  live_briefing_id?: string;
  report_id?: number;
  audio_path?: string;
  error?: string;
}

export interface SynthesisDeps {
  store: ItemStore;
  llm: LanguageModel;
  speech: SpeechSynthesizer;
  audioDir?: string;
  showName?: string;
  scriptTargetWords?: number;
  retryPolicy?: RetryPolicy;
  now?: () => Date;
}

/**
 * Union of the pending items (most recent first) and the live-briefing item,
 * which is appended unless it is already pending.
 */
export function selectBatch(pending: readonly Item[], liveBriefing: Item | undefined): Item[] {
  const batch = [...pending];
  if (liveBriefing && !batch.some(item => item.id === liveBriefing.id)) {
    batch.push(liveBriefing);
  }
  return batch;
}

export function audioFileName(generatedAt: Date): string {
  return `podcast_${Clock.toFileStamp(generatedAt)}.mp3`;
}

export class SynthesisAgent extends BaseAgent<SynthesisInput, SynthesisOutput> {
  private store: ItemStore;
  private llm: LanguageModel;
  private speech: SpeechSynthesizer;
  private audioDir: string;
  private showName: string;
  private scriptTargetWords: number;
  private retryPolicy: RetryPolicy;
  private now: () => Date;

  constructor(deps: SynthesisDeps) {
    super({ name: 'SynthesisAgent' });

    this.store = deps.store;
    this.llm = deps.llm;
    this.speech = deps.speech;
    this.audioDir = deps.audioDir ?? Config.resolvePath(Config.AUDIO_DIR);
    this.showName = deps.showName ?? Config.SHOW_NAME;
    this.scriptTargetWords = deps.scriptTargetWords ?? Config.SCRIPT_TARGET_WORDS;
    this.retryPolicy = deps.retryPolicy ?? MODEL_RETRY_POLICY;
    this.now = deps.now ?? (() => new Date());
  }

  protected async process(input: SynthesisInput): Promise<SynthesisOutput> {
    const generatedAt = this.now();

    const pending = this.store.listPendingSynthesis();
    const liveBriefing = input.live_briefing_source
      ? this.store.latestFromSourceSince(input.live_briefing_source, Clock.addHours(generatedAt, -input.window_hours))
      : undefined;

    const batch = selectBatch(pending, liveBriefing);
    const itemIds = batch.map(item => item.id);

    if (batch.length === 0) {
      Logger.info('No processed items to synthesize');
      return { status: 'no_op', batch_size: 0, item_ids: [] };
    }

    Logger.info(`Synthesizing ${batch.length} items into a report`, {
      pending: pending.length,
      live_briefing_id: liveBriefing?.id,
    });

    try {
      const report = await this.generate(batch, input.live_briefing_source, generatedAt);
      Logger.info('Saved new report', { reportId: report.id, audioPath: report.audio_path });

      return {
        status: 'committed',
        batch_size: batch.length,
        item_ids: itemIds,
        live_briefing_id: liveBriefing?.id,
        report_id: report.id,
        audio_path: report.audio_path,
      };
    } catch (error) {
      Logger.error('Synthesis failed, nothing was committed', { error: errorMessage(error) });
      return {
        status: 'rolled_back',
        batch_size: batch.length,
        item_ids: itemIds,
        live_briefing_id: liveBriefing?.id,
        error: errorMessage(error),
      };
    }
  }

  private async generate(batch: readonly Item[], liveBriefingSource: string | undefined, generatedAt: Date): Promise<Report> {
    const corpora = buildCorpora(batch);

    Logger.info('Generating executive report');
    const sections = await retryWithPolicy(
      () => this.llm.generateStructured(buildReportPrompt(corpora.summaries, liveBriefingSource), ReportSchema, {
        temperature: 0.2,
      }),
      this.retryPolicy,
      'Executive report generation'
    );

    Logger.info('Generating spoken script');
    const script = await retryWithPolicy(
      () => this.llm.generateText(buildScriptPrompt(corpora.rawText, this.showName, this.scriptTargetWords)),
      this.retryPolicy,
      'Script generation'
    );

    Logger.info('Rendering script to audio', { words: script.split(/\s+/).length });
    const audio = await retryWithPolicy(() => this.speech.synthesize(script), this.retryPolicy, 'Speech synthesis');

    const audioPath = path.join(this.audioDir, audioFileName(generatedAt));
    await fs.mkdir(this.audioDir, { recursive: true });
    await fs.writeFile(audioPath, audio);

    try {
      return this.store.commitReport(
        { generated_at: generatedAt.toISOString(), ...sections, audio_path: audioPath },
        batch.map(item => item.id)
      );
    } catch (error) {
      // The transaction rolled back; do not leave an artifact no report points at
      await fs.rm(audioPath, { force: true });
      throw error;
    }
  }
}
