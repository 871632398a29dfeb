/**
 * Orchestrator - wires each stage to its real collaborators and runs it once.
 *
 * Every stage is its own process invocation; nothing here calls one stage
 * from another.
 */

import { DistillationAgent } from './agents/distillation';
import { IngestionAgent } from './agents/ingestion';
import { SynthesisAgent } from './agents/synthesis';
import { Config } from './config';
import { isStoreUnavailableError } from './errors';
import type { AgentMessage } from './types';
import { FeedTool } from './tools/feed';
import { HttpTool } from './tools/http';
import { ItemStore } from './tools/item-store';
import { OpenAiLanguageModel } from './tools/llm';
import { RunGuard } from './tools/run-guard';
import { YoutubeTranscriptSource } from './tools/transcript';
import { OpenAiSpeechSynthesizer } from './tools/tts';
import { VideoTool } from './tools/video';
import { Crypto, Logger, errorMessage } from './utils';

export type Stage = 'ingest' | 'distill' | 'synthesize';

function openStore(): ItemStore | null {
  try {
    return ItemStore.open(Config.resolvePath(Config.DB_PATH));
  } catch (error) {
    if (isStoreUnavailableError(error)) {
      Logger.error(error.message, { dbPath: error.dbPath, troubleshooting: error.troubleshooting });
    } else {
      Logger.error('Failed to open item store', { error: errorMessage(error) });
    }
    return null;
  }
}

/**
 * Exit code 1 when the stage recorded errors or its output reports a failure
 * it handled itself.
 */
async function runWithStore<I, O>(
  stage: Stage,
  run: (store: ItemStore, runId: string) => Promise<AgentMessage<I, O>>,
  isFailure: (output: O) => boolean = () => false
): Promise<number> {
  const store = openStore();
  if (!store) {
    return 1;
  }

  const runId = Crypto.uuid();
  try {
    const message = await run(store, runId);
    Logger.info(`Stage ${stage} finished`, { runId, errors: message.errors, output: message.output });
    const failed = message.errors.length > 0 || (message.output !== undefined && isFailure(message.output));
    return failed ? 1 : 0;
  } catch (error) {
    Logger.error(`Stage ${stage} could not start`, { runId, error: errorMessage(error) });
    return 1;
  } finally {
    store.close();
  }
}

export function runIngestion(): Promise<number> {
  return runWithStore('ingest', (store, runId) => {
    const sources = Config.loadSources();
    const http = new HttpTool();
    const agent = new IngestionAgent(sources, {
      store,
      feeds: new FeedTool(http),
      pages: http,
      videos: new VideoTool(http, new YoutubeTranscriptSource()),
    });
    return agent.execute(runId, { limit_per_source: Config.MAX_ENTRIES_PER_SOURCE });
  });
}

export function runDistillation(): Promise<number> {
  return runWithStore('distill', (store, runId) => {
    const agent = new DistillationAgent({
      store,
      llm: new OpenAiLanguageModel(),
      guard: new RunGuard({ lockPath: Config.resolvePath(Config.RUN_GUARD_PATH) }),
    });
    return agent.execute(runId, {});
  });
}

export function runSynthesis(): Promise<number> {
  return runWithStore('synthesize', (store, runId) => {
    const agent = new SynthesisAgent({
      store,
      llm: new OpenAiLanguageModel(),
      speech: new OpenAiSpeechSynthesizer(),
    });
    return agent.execute(runId, {
      live_briefing_source: Config.liveBriefingSource(Config.loadSources()),
      window_hours: Config.LIVE_BRIEFING_WINDOW_HOURS,
    });
  }, output => output.status === 'rolled_back');
}

/**
 * Open the store (which applies pending migrations) and report what ran.
 */
export function runMigrate(): number {
  const store = openStore();
  if (!store) {
    return 1;
  }
  const applied = store.appliedMigrations;
  store.close();
  Logger.info('Schema is up to date', { dbPath: Config.resolvePath(Config.DB_PATH), applied });
  return 0;
}
