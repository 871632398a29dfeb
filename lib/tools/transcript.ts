/**
 * Transcript source backed by the public YouTube caption tracks
 */

import { YoutubeTranscript } from 'youtube-transcript';
import type { TranscriptSegment, TranscriptSource } from './video';

// Caption text arrives HTML-escaped, sometimes twice (&amp;#39;)
function decodeEntities(text: string): string {
  return text
    .replace(/&amp;/g, '&')
    .replace(/&#39;/g, "'")
    .replace(/&quot;/g, '"')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>');
}

export class YoutubeTranscriptSource implements TranscriptSource {
  constructor(private lang?: string) {}

  async fetchTranscript(videoId: string): Promise<TranscriptSegment[]> {
    const segments = await YoutubeTranscript.fetchTranscript(videoId, this.lang ? { lang: this.lang } : undefined);
    return segments.map(segment => ({
      text: decodeEntities(segment.text),
      offset: segment.offset,
      duration: segment.duration,
    }));
  }
}
