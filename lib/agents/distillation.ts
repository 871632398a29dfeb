/**
 * Distillation Agent - Categorizes and condenses every unprocessed item
 */

import { BaseAgent } from './base';
import { DistillationSchema, buildDistillationPrompt } from './prompts';
import type { ItemStore } from '../tools/item-store';
import type { LanguageModel } from '../tools/llm';
import { type RunGuard, withRunGuard } from '../tools/run-guard';
import { Logger, errorMessage } from '../utils';
import { MODEL_RETRY_POLICY, type RetryPolicy, retryWithPolicy } from '../utils/retry';

export type DistillationInput = Record<string, never>;

export interface DistillationOutput {
  status: 'completed' | 'guard_held';
  guard_holder?: number;
  items_found: number;
  distilled: number;
  empty: number;
  failed: number;
}

export interface DistillationDeps {
  store: ItemStore;
  llm: LanguageModel;
  guard: RunGuard;
  retryPolicy?: RetryPolicy;
}

export class DistillationAgent extends BaseAgent<DistillationInput, DistillationOutput> {
  private store: ItemStore;
  private llm: LanguageModel;
  private guard: RunGuard;
  private retryPolicy: RetryPolicy;

  constructor(deps: DistillationDeps) {
    super({ name: 'DistillationAgent' });

    this.store = deps.store;
    this.llm = deps.llm;
    this.guard = deps.guard;
    this.retryPolicy = deps.retryPolicy ?? MODEL_RETRY_POLICY;
  }

  protected async process(): Promise<DistillationOutput> {
    const outcome = await withRunGuard(this.guard, () => this.distillPending());

    if (!outcome.acquired) {
      Logger.warn('Another distillation run is active, exiting without work', { holder: outcome.holder });
      return { status: 'guard_held', guard_holder: outcome.holder, items_found: 0, distilled: 0, empty: 0, failed: 0 };
    }

    return outcome.result;
  }

  private async distillPending(): Promise<DistillationOutput> {
    const pending = this.store.listUnprocessed();
    const output: DistillationOutput = {
      status: 'completed',
      items_found: pending.length,
      distilled: 0,
      empty: 0,
      failed: 0,
    };

    if (pending.length === 0) {
      Logger.info('No unprocessed items found');
      return output;
    }

    Logger.info(`Found ${pending.length} unprocessed items to distill`);

    for (const item of pending) {
      try {
        if (!item.raw_text.trim()) {
          Logger.info('Item has no text, marking processed', { id: item.id });
          this.store.markProcessedWithoutContent(item.id);
          output.empty++;
          continue;
        }

        const result = await retryWithPolicy(
          () => this.llm.generateStructured(buildDistillationPrompt(item.raw_text), DistillationSchema),
          this.retryPolicy,
          `Distillation of ${item.id}`
        );
        this.store.saveDistillation(item.id, result);
        output.distilled++;
        Logger.info('Distilled item', { id: item.id, category: result.category });
      } catch (error) {
        // Nothing was written for this item; it stays unprocessed for the next run
        output.failed++;
        Logger.error('Failed to distill item', { id: item.id, error: errorMessage(error) });
      }
    }

    return output;
  }
}
