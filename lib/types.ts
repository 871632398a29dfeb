/**
 * Core type definitions for the distillation pipeline
 */

export type SourceKind = 'feed' | 'video-channel';

export interface SourceDescriptor {
  name: string;
  endpoint: string;
  kind: SourceKind;
  fullText?: boolean; // false for feeds whose body is already the full text (abstracts)
  liveBriefing?: boolean;
}

export interface Item {
  id: string;
  source: string;
  title: string;
  url: string;
  raw_text: string;
  summary: string;
  category: string | null;
  audio_path: string | null;
  published_at: string | null;
  ingested_at: string | null;
  processed: boolean;
  synthesized: boolean;
  insertion_sequence: number;
}

export interface NewItem {
  id: string;
  source: string;
  title: string;
  url: string;
  raw_text: string;
  summary: string;
  audio_path: string | null;
  published_at: string;
}

export interface Distillation {
  category: string;
  summary: string;
}

export interface ReportSections {
  whats_new: string;
  feature_brief_summary: string;
  key_takeaways: string;
}

export interface Report extends ReportSections {
  id: number;
  generated_at: string;
  audio_path: string;
}

export interface NewReport extends ReportSections {
  generated_at: string;
  audio_path: string;
}

export interface AgentMessage<I, O> {
  agent: string;
  run_id: string;
  timestamp: string;
  input: I;
  output?: O;
  errors: string[];
  duration_ms?: number;
}
