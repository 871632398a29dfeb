/**
 * Prompt builders for distillation and synthesis
 */

import { z } from 'zod';
import type { Item } from '../types';

export const DistillationSchema = z.object({
  category: z.string().trim().min(1),
  summary: z.string().trim().min(1),
});

export const ReportSchema = z.object({
  whats_new: z.string().trim().min(1),
  feature_brief_summary: z.string().trim().min(1),
  key_takeaways: z.string().trim().min(1),
});

export function buildDistillationPrompt(text: string): string {
  return [
    'Process the following text and answer with a JSON object of the form {"category": string, "summary": string}.',
    '1. "category": the specific industry or use case the text is about (e.g. Healthcare, Software Engineering, Finance).',
    '2. "summary": a highly condensed, three-sentence summary keeping only the information most relevant and applicable for professionals.',
    '',
    'Text to process:',
    text,
  ].join('\n');
}

export interface Corpora {
  summaries: string;
  rawText: string;
}

/**
 * Two views of the same batch: summaries for the written report, full text for
 * the spoken script. Each entry carries its source and title for attribution.
 */
export function buildCorpora(batch: readonly Item[]): Corpora {
  return {
    summaries: batch
      .map(item => `Source: ${item.source}\nTitle: ${item.title}\nSummary: ${item.summary}`)
      .join('\n\n'),
    rawText: batch
      .map(item => `Source: ${item.source}\nTitle: ${item.title}\nContent: ${item.raw_text}`)
      .join('\n\n'),
  };
}

export function buildReportPrompt(summaries: string, liveBriefingSource: string | undefined): string {
  const briefing = liveBriefingSource
    ? [
        `2. "feature_brief_summary": find the entries whose Source is exactly "${liveBriefingSource}" and summarize that content comprehensively.`,
        '   - Organize it by the distinct topics discussed.',
        "   - For each topic write a main bullet ('* **Topic Name:** Description').",
        "   - Directly under each topic add an indented sub-bullet '* So what does this mean in plain English:' explaining the impact and potential industry applications.",
        `   - If no entry comes from "${liveBriefingSource}", say so in a single bullet.`,
      ]
    : ['2. "feature_brief_summary": the single most significant story in the batch, broken into topic bullets each followed by a plain-English sub-bullet on why it matters.'];

  return [
    'You are an expert industry analyst.',
    'Review the following collection of recent news summaries and synthesize them into a concise, executive-level report that can be read in under 3 minutes.',
    '',
    'Answer with a JSON object with exactly these three string fields:',
    '1. "whats_new": the most important general news and trends.',
    ...briefing,
    '3. "key_takeaways": actionable insights for professionals.',
    '',
    'Format the content of every field as a markdown bulleted list using asterisks (*), with a newline between bullets.',
    '',
    'Summaries batch:',
    summaries,
  ].join('\n');
}

export function buildScriptPrompt(rawText: string, showName: string, targetWords: number): string {
  const minutes = Math.max(1, Math.round(targetWords / 150));

  return [
    `You are an engaging solo podcast host for "${showName}".`,
    `Turn the following articles into a conversational script that takes about ${minutes} minutes to read aloud (about ${targetWords} words).`,
    'Speak directly to the listener in a natural, relaxed tone with conversational transitions.',
    'Write ONLY the words to be spoken: no speaker labels, no sound or music cues, no stage directions, no headings.',
    "Open with an energetic welcome framing this as today's update, then go straight into the top stories, covering the big trends, product and model updates, and actionable takeaways.",
    '',
    'Articles:',
    rawText,
  ].join('\n');
}
