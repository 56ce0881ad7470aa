// src/transcription/audio.ts
// ffmpeg helpers: duration probe and silence trimming (fluent-ffmpeg).

import ffmpeg from 'fluent-ffmpeg';

// Leading silence, plus any pause of 1s or more below -50dB.
const SILENCE_FILTER =
  'silenceremove=start_periods=1:start_threshold=-50dB:start_silence=0.5:' +
  'stop_periods=-1:stop_threshold=-50dB:stop_duration=1';

/** Media duration in seconds, or undefined when ffprobe cannot tell. */
export const probeDurationSeconds = async (inputPath: string) =>
  await new Promise<number | undefined>((resolve) => {
    ffmpeg.ffprobe(inputPath, (error, metadata) => {
      if (error) {
        resolve(undefined);
        return;
      }
      const duration = metadata?.format?.duration;
      if (typeof duration !== 'number' || !Number.isFinite(duration)) {
        resolve(undefined);
        return;
      }
      resolve(duration > 0 ? duration : undefined);
    });
  });

/** Write a mono 16 kHz mp3 of `inputPath` with silences removed. */
export const trimSilence = async (inputPath: string, outputPath: string) =>
  await new Promise<void>((resolve, reject) => {
    ffmpeg(inputPath)
      .noVideo()
      .audioFilters(SILENCE_FILTER)
      .audioCodec('libmp3lame')
      .audioChannels(1)
      .audioFrequency(16000)
      .toFormat('mp3')
      .on('end', () => {
        resolve();
      })
      .on('error', (error) => {
        reject(error);
      })
      .save(outputPath);
  });
