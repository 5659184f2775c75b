/**
 * Audio Tool - Narration assembly and ffmpeg mixing
 *
 * Speech arrives as raw 16-bit mono PCM, so lines and pauses are joined as
 * bytes. Loudness normalization, music beds and encoding happen in a single
 * ffmpeg pass (through fluent-ffmpeg).
 */

import ffmpeg from 'fluent-ffmpeg';
import { Readable } from 'stream';
import { AudioRenderError } from '../errors';
import { AudioFormat } from '../types';
import { Logger } from '../utils';

/** Signed 16-bit little-endian mono samples */
export interface PcmClip {
  sampleRate: number;
  pcm: Buffer;
}

export interface MixRequest {
  narration: PcmClip;
  outputPath: string;
  format: AudioFormat;
  intro_music_path?: string;
  outro_music_path?: string;
}

export interface AudioMixer {
  mix(request: MixRequest): Promise<void>;
}

export interface MixFilterOptions {
  sampleRate: number;
  durationMs: number;
  intro: boolean;
  outro: boolean;
  targetLUFS?: number;
}

export const MUSIC_BED_MS = 5000;
export const MUSIC_BED_GAIN_DB = -20;

const BYTES_PER_SAMPLE = 2;

export class AudioTool {
  /** OpenAI speech `pcm` output: 24kHz, mono, signed 16-bit little-endian */
  static readonly TTS_SAMPLE_RATE = 24000;

  static fromPcm16(buffer: Buffer, sampleRate: number): PcmClip {
    return { sampleRate, pcm: buffer.subarray(0, buffer.length - (buffer.length % BYTES_PER_SAMPLE)) };
  }

  static silence(durationMs: number, sampleRate: number): PcmClip {
    const samples = Math.max(0, Math.round((durationMs * sampleRate) / 1000));
    return { sampleRate, pcm: Buffer.alloc(samples * BYTES_PER_SAMPLE) };
  }

  static durationMs(clip: PcmClip): number {
    return (clip.pcm.length / BYTES_PER_SAMPLE / clip.sampleRate) * 1000;
  }

  static concat(clips: PcmClip[]): PcmClip {
    Logger.debug('Concatenating audio clips', { count: clips.length });

    if (clips.length === 0) {
      throw new AudioRenderError('No audio clips to concatenate');
    }

    const { sampleRate } = clips[0];
    if (clips.some(clip => clip.sampleRate !== sampleRate)) {
      throw new AudioRenderError('Cannot concatenate clips with different sample rates');
    }

    return { sampleRate, pcm: Buffer.concat(clips.map(clip => clip.pcm)) };
  }

  /**
   * Filter graph for one render. Input 0 is the narration; the intro and
   * outro beds follow in that order when present, each looped on input.
   * The graph ends in the `out` label and keeps the narration's length.
   */
  static buildMixFilter(options: MixFilterOptions): string[] {
    const { sampleRate, durationMs, intro, outro, targetLUFS = -16 } = options;
    const bed = `aresample=${sampleRate},aformat=channel_layouts=mono,atrim=duration=${MUSIC_BED_MS / 1000},asetpts=PTS-STARTPTS,volume=${MUSIC_BED_GAIN_DB}dB`;
    const voice = `[0:a]loudnorm=I=${targetLUFS}:TP=-1.5:LRA=11,aresample=${sampleRate}`;

    if (!intro && !outro) {
      return [`${voice}[out]`];
    }

    const filters = [`${voice}[voice]`];
    const labels = ['[voice]'];
    let input = 1;

    if (intro) {
      filters.push(`[${input++}:a]${bed}[intro]`);
      labels.push('[intro]');
    }
    if (outro) {
      const offsetMs = Math.round(Math.max(0, durationMs - MUSIC_BED_MS));
      filters.push(`[${input++}:a]${bed},adelay=${offsetMs}|${offsetMs}[outro]`);
      labels.push('[outro]');
    }

    filters.push(`${labels.join('')}amix=inputs=${labels.length}:duration=first:dropout_transition=0:normalize=0[out]`);
    return filters;
  }
}

export class FfmpegMixer implements AudioMixer {
  mix(request: MixRequest): Promise<void> {
    const { narration, outputPath, format, intro_music_path, outro_music_path } = request;
    const filters = AudioTool.buildMixFilter({
      sampleRate: narration.sampleRate,
      durationMs: AudioTool.durationMs(narration),
      intro: Boolean(intro_music_path),
      outro: Boolean(outro_music_path),
    });

    Logger.debug('Running ffmpeg mix', { output: outputPath, format, filters });

    return new Promise((resolve, reject) => {
      const command = ffmpeg()
        .input(Readable.from([narration.pcm]))
        .inputFormat('s16le')
        .inputOptions([`-ar ${narration.sampleRate}`, '-ac 1']);

      for (const music of [intro_music_path, outro_music_path]) {
        if (music) {
          command.input(music).inputOptions(['-stream_loop -1']);
        }
      }

      command
        .complexFilter(filters, ['out'])
        .audioChannels(1)
        .audioFrequency(narration.sampleRate);

      if (format === 'mp3') {
        command.audioCodec('libmp3lame').audioBitrate('192k').format('mp3');
      } else {
        command.audioCodec('pcm_s16le').format('wav');
      }

      command
        .on('error', (error: Error) => {
          reject(new AudioRenderError(
            `ffmpeg failed to render ${outputPath} (${error.message}). Is ffmpeg on PATH? Use --skip-audio to skip rendering.`,
            { cause: error }
          ));
        })
        .on('end', () => resolve())
        .save(outputPath);
    });
  }
}
