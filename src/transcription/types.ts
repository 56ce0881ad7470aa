// src/transcription/types.ts

export interface Transcript {
  text: string;
  durationMinutes: number;
}

export interface TranscribeOptions {
  /** Translate non-English speech into English. */
  translate: boolean;
  /** ISO-639-1 hint, empty for auto-detect. */
  language: string;
  /** Strip leading silence and long pauses before upload. */
  trimSilence: boolean;
  /** Decoding temperature; 0 is the most deterministic. */
  temperature: number;
  timeoutMs: number;
}

/**
 * Speech-to-text collaborator. Implementations never throw: any failure is
 * logged and reported as an empty transcript.
 */
export interface Transcriber {
  transcribe(localPath: string, options?: Partial<TranscribeOptions>): Promise<Transcript>;
}

export const EMPTY_TRANSCRIPT: Transcript = Object.freeze({ text: '', durationMinutes: 0 });
