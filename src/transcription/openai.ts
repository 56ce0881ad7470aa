// src/transcription/openai.ts
// Transcriber backed by the OpenAI audio API (Whisper).

import fs from 'node:fs';
import fsp from 'node:fs/promises';
import OpenAI from 'openai';
import { createChildLogger, createLogger } from '../observability/logger.js';
import { probeDurationSeconds, trimSilence } from './audio.js';
import { EMPTY_TRANSCRIPT, type TranscribeOptions, type Transcriber, type Transcript } from './types.js';

const log = createLogger('transcription/openai');

export interface AudioToolkit {
  probeDurationSeconds(inputPath: string): Promise<number | undefined>;
  trimSilence(inputPath: string, outputPath: string): Promise<void>;
}

export interface OpenAITranscriberOptions {
  apiKey: string;
  model: string;
  defaults: TranscribeOptions;
  client?: OpenAI;
  audio?: AudioToolkit;
}

export class OpenAITranscriber implements Transcriber {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly defaults: TranscribeOptions;
  private readonly audio: AudioToolkit;

  constructor(options: OpenAITranscriberOptions) {
    if (!options.client && !options.apiKey) {
      throw new Error('OPENAI_API_KEY is not set. Set it in your environment to use OpenAI transcription.');
    }
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
    this.model = options.model;
    this.defaults = options.defaults;
    this.audio = options.audio ?? { probeDurationSeconds, trimSilence };
  }

  async transcribe(localPath: string, overrides: Partial<TranscribeOptions> = {}): Promise<Transcript> {
    const opts: TranscribeOptions = { ...this.defaults, ...overrides };
    const tlog = createChildLogger(log, { localPath, translate: opts.translate });
    let trimmedPath: string | null = null;

    try {
      const stat = await fsp.stat(localPath);
      if (stat.size === 0) {
        tlog.warn('Media file is empty, nothing to transcribe');
        return EMPTY_TRANSCRIPT;
      }

      let uploadPath = localPath;
      if (opts.trimSilence) {
        const candidate = `${localPath}.trimmed.mp3`;
        try {
          await this.audio.trimSilence(localPath, candidate);
          trimmedPath = candidate;
          uploadPath = candidate;
        } catch (err) {
          tlog.warn({ err }, 'Silence trimming failed, uploading original media');
        }
      }

      const seconds = await this.audio.probeDurationSeconds(localPath);
      // Aborts the upload itself once the deadline passes.
      const signal = AbortSignal.timeout(opts.timeoutMs);
      const text = await this.request(uploadPath, opts, signal);

      const transcript: Transcript = {
        text: text.trim(),
        durationMinutes: seconds ? Math.round(seconds / 60) : 0,
      };
      tlog.info({ chars: transcript.text.length, durationMinutes: transcript.durationMinutes }, 'Transcription complete');
      return transcript;
    } catch (err) {
      tlog.error({ err, timeoutMs: opts.timeoutMs }, 'Transcription failed');
      return EMPTY_TRANSCRIPT;
    } finally {
      if (trimmedPath) {
        await fsp.rm(trimmedPath, { force: true }).catch((err: unknown) => {
          tlog.warn({ err, trimmedPath }, 'Could not remove trimmed media');
        });
      }
    }
  }

  private async request(uploadPath: string, opts: TranscribeOptions, signal: AbortSignal): Promise<string> {
    const file = fs.createReadStream(uploadPath);
    const requestOptions = { signal, maxRetries: 0 };
    if (opts.translate) {
      // The translations endpoint always targets English and takes no language hint.
      const res = await this.client.audio.translations.create(
        { file, model: this.model, response_format: 'json', temperature: opts.temperature },
        requestOptions
      );
      return res.text ?? '';
    }
    const res = await this.client.audio.transcriptions.create(
      {
        file,
        model: this.model,
        response_format: 'json',
        temperature: opts.temperature,
        ...(opts.language ? { language: opts.language } : {}),
      },
      requestOptions
    );
    return res.text ?? '';
  }
}
