/**
 * TTS Tool - Text-to-speech using OpenAI
 */

import OpenAI from 'openai';
import { Config } from '../config';
import { MalformedResponseError } from '../errors';
import { Logger } from '../utils';

export type TtsVoice = 'alloy' | 'echo' | 'fable' | 'onyx' | 'nova' | 'shimmer';

const VOICES: readonly TtsVoice[] = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'];

export function parseVoice(value: string): TtsVoice {
  return VOICES.find(voice => voice === value) ?? 'nova';
}

/**
 * One synthesis call, no retries. Returns mp3 bytes.
 */
export interface SpeechSynthesizer {
  synthesize(text: string): Promise<Buffer>;
}

export interface OpenAiSpeechOptions {
  apiKey?: string;
  model?: string;
  voice?: TtsVoice;
  speed?: number;
  timeoutMs?: number;
  client?: OpenAI;
}

export class OpenAiSpeechSynthesizer implements SpeechSynthesizer {
  private client: OpenAI;
  private model: string;
  private voice: TtsVoice;
  private speed: number;

  constructor(options: OpenAiSpeechOptions = {}) {
    this.model = options.model ?? Config.TTS_MODEL;
    this.voice = options.voice ?? parseVoice(Config.TTS_VOICE);
    this.speed = options.speed ?? 1.0;
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey ?? Config.OPENAI_API_KEY,
        timeout: options.timeoutMs ?? Config.LLM_TIMEOUT_MS,
        maxRetries: 0,
      });
  }

  async synthesize(text: string): Promise<Buffer> {
    Logger.info('Starting TTS API call', {
      model: this.model,
      voice: this.voice,
      textLength: text.length,
    });

    const response = await this.client.audio.speech.create({
      model: this.model,
      voice: this.voice,
      input: text,
      response_format: 'mp3',
      speed: this.speed,
    });

    const buffer = Buffer.from(await response.arrayBuffer());

    if (buffer.length === 0) {
      throw new MalformedResponseError('OpenAI TTS returned empty audio buffer');
    }

    Logger.info('TTS synthesis complete', { bufferSize: buffer.length });
    return buffer;
  }
}
