/**
 * Audio Engineer Agent - Renders each dialogue line and mixes the episode
 */

import { access, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { BaseAgent } from './base';
import { AudioRenderError, errorMessage } from '../errors';
import { AudioFormat, HostPair, Script, TtsVoice } from '../types';
import { SpeechSynthesizer, TtsTool } from '../tools/tts';
import { AudioMixer, AudioTool, FfmpegMixer, MixRequest, PcmClip } from '../tools/audio';
import { stripCitations } from '../script/citations';
import { Logger, truncate } from '../utils';

export interface AudioEngineerInput {
  script: Script;
  hosts: HostPair;
  output_path: string;
  format: AudioFormat;
  pause_duration_ms: number;
  intro_music_path?: string;
  outro_music_path?: string;
}

export interface AudioEngineerOutput {
  output_path: string;
  duration_sec: number;
  lines_rendered: number;
}

export function mapHostsToVoices(hosts: HostPair): Map<string, TtsVoice> {
  const voices = new Map<string, TtsVoice>();
  for (const host of hosts) {
    if (!host.voice) {
      throw new AudioRenderError(`Host '${host.name}' has no 'voice' configured in personas`);
    }
    voices.set(host.name, host.voice);
  }
  return voices;
}

/**
 * Swap the extension so the file name matches the export format
 */
export function withFormatExtension(path: string, format: AudioFormat): string {
  return path.endsWith(`.${format}`) ? path : `${path.replace(/\.[^./\\]+$/, '')}.${format}`;
}

async function existingMusic(path: string | undefined, label: string): Promise<string | undefined> {
  if (!path) {
    return undefined;
  }
  try {
    await access(path);
    return path;
  } catch {
    Logger.warn(`${label} music file not found, skipping`, { file: path });
    return undefined;
  }
}

export class AudioEngineerAgent extends BaseAgent<AudioEngineerInput, AudioEngineerOutput> {
  private tts: SpeechSynthesizer;
  private mixer: AudioMixer;

  constructor(tts: SpeechSynthesizer = new TtsTool(), mixer: AudioMixer = new FfmpegMixer()) {
    super({
      name: 'AudioEngineerAgent',
    });

    this.tts = tts;
    this.mixer = mixer;
  }

  protected async process(input: AudioEngineerInput): Promise<AudioEngineerOutput> {
    const { script, hosts, format, pause_duration_ms } = input;

    if (script.dialogue.length === 0) {
      throw new AudioRenderError('Script contains no dialogue to render');
    }

    const voices = mapHostsToVoices(hosts);
    const clips = await this.renderLines(script, voices, pause_duration_ms);
    const narration = AudioTool.concat(clips);

    const outputPath = withFormatExtension(input.output_path, format);
    await mkdir(dirname(outputPath), { recursive: true });

    const request: MixRequest = {
      narration,
      outputPath,
      format,
      intro_music_path: await existingMusic(input.intro_music_path, 'Intro'),
      outro_music_path: await existingMusic(input.outro_music_path, 'Outro'),
    };
    await this.mixEpisode(request);

    const durationSec = AudioTool.durationMs(narration) / 1000;
    Logger.info('Audio rendering complete', {
      output: outputPath,
      duration_sec: Math.round(durationSec * 10) / 10,
      format,
    });

    return {
      output_path: outputPath,
      duration_sec: durationSec,
      lines_rendered: script.dialogue.filter(line => stripCitations(line.text)).length,
    };
  }

  /**
   * A music bed ffmpeg cannot read is dropped and the narration rendered alone
   */
  private async mixEpisode(request: MixRequest): Promise<void> {
    if (!request.intro_music_path && !request.outro_music_path) {
      await this.mixer.mix(request);
      return;
    }

    Logger.info('Mixing music beds', {
      intro: request.intro_music_path,
      outro: request.outro_music_path,
    });

    try {
      await this.mixer.mix(request);
    } catch (error) {
      Logger.warn('Could not mix background music, rendering narration only', { error: errorMessage(error) });
      await this.mixer.mix({ ...request, intro_music_path: undefined, outro_music_path: undefined });
    }
  }

  /**
   * One clip per non-empty line, with silence between consecutive lines
   */
  private async renderLines(
    script: Script,
    voices: Map<string, TtsVoice>,
    pauseMs: number
  ): Promise<PcmClip[]> {
    const clips: PcmClip[] = [];
    const total = script.dialogue.length;

    for (const [idx, line] of script.dialogue.entries()) {
      const text = stripCitations(line.text);
      if (!text) {
        Logger.debug(`Line ${idx + 1}: skipping empty text`);
        continue;
      }

      const voice = voices.get(line.speaker);
      if (!voice) {
        throw new AudioRenderError(`Speaker '${line.speaker}' not found in voice mappings`);
      }

      Logger.info(`Synthesizing line ${idx + 1}/${total}`, {
        speaker: line.speaker,
        preview: truncate(line.text, 50),
      });

      let clip: PcmClip;
      try {
        clip = await this.tts.synthesize({ voice, text });
      } catch (error) {
        throw new AudioRenderError(`Failed to render line ${idx + 1} (${line.speaker}): ${errorMessage(error)}`, {
          cause: error,
        });
      }

      if (clips.length > 0) {
        clips.push(AudioTool.silence(pauseMs, clip.sampleRate));
      }
      clips.push(clip);
    }

    if (clips.length === 0) {
      throw new AudioRenderError('No audio segments were generated');
    }
    return clips;
  }
}
