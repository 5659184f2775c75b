/**
 * Orchestrator - Coordinates the entire agent pipeline
 */

import { join } from 'path';
import { Config } from './config';
import { Logger, newRunId } from './utils';
import { AudioFormat, HostPair, Script, Story, ValidationWarning } from './types';
import { NewsSource } from './tools/news-api';
import { ChatModel } from './tools/llm';
import { SpeechSynthesizer } from './tools/tts';
import { AudioMixer } from './tools/audio';
import { OutputPaths } from './tools/output-writer';

import { IngestionAgent } from './agents/ingestion';
import { ScriptwriterAgent } from './agents/scriptwriter';
import { AudioEngineerAgent } from './agents/audio-engineer';
import { PublisherAgent } from './agents/publisher';

export interface OrchestratorDeps {
  newsSource?: NewsSource;
  chatModel?: ChatModel;
  synthesizer?: SpeechSynthesizer;
  mixer?: AudioMixer;
}

export interface OrchestratorInput {
  hosts: HostPair;
  target_duration_min?: number;
  topics?: string[];
  region?: string;
  hours_back?: number;
  max_stories?: number;
  profanity_filter?: boolean;
  output_dir?: string;
  audio_format?: AudioFormat;
  pause_duration_ms?: number;
  intro_music_path?: string;
  outro_music_path?: string;
  skip_audio?: boolean;
}

export interface OrchestratorOutput {
  run_id: string;
  stories: Story[];
  script: Script;
  warnings: ValidationWarning[];
  word_count: number;
  target_word_count: number;
  files: OutputPaths;
  audio?: {
    path: string;
    duration_sec: number;
  };
  metrics: {
    total_time_ms: number;
    agent_times: Record<string, number>;
  };
}

export class Orchestrator {
  private ingestionAgent: IngestionAgent;
  private scriptwriterAgent: ScriptwriterAgent;
  private audioEngineerAgent: AudioEngineerAgent;
  private publisherAgent: PublisherAgent;

  constructor(deps: OrchestratorDeps = {}) {
    this.ingestionAgent = new IngestionAgent(deps.newsSource);
    this.scriptwriterAgent = new ScriptwriterAgent(deps.chatModel);
    this.audioEngineerAgent = new AudioEngineerAgent(deps.synthesizer, deps.mixer);
    this.publisherAgent = new PublisherAgent();
  }

  async run(input: OrchestratorInput): Promise<OrchestratorOutput> {
    const startTime = Date.now();
    const agentTimes: Record<string, number> = {};
    const runId = newRunId();

    const {
      hosts,
      target_duration_min = 5,
      topics = ['general'],
      region = 'us',
      hours_back = Config.HOURS_BACK,
      max_stories = Config.MAX_STORIES,
      profanity_filter = false,
      output_dir = 'out',
      audio_format = 'mp3',
      pause_duration_ms = 1000,
      skip_audio = false,
    } = input;

    Logger.info('🚀 ORCHESTRATOR START', {
      runId,
      topics,
      region,
      target_duration_min,
      skip_audio,
    });

    // 1. INGESTION
    Logger.info('Phase 1: Ingestion');
    const ingestion = await this.ingestionAgent.execute(runId, {
      topics,
      region,
      hours_back,
      max_stories,
    });
    agentTimes.ingestion = ingestion.duration_ms;
    const { stories } = ingestion.output;

    // 2. SCRIPT
    Logger.info('Phase 2: Scriptwriting');
    const scriptwriter = await this.scriptwriterAgent.execute(runId, {
      stories,
      hosts,
      target_duration_min,
      profanity_filter,
    });
    agentTimes.scriptwriter = scriptwriter.duration_ms;
    const { script } = scriptwriter.output;

    // 3. AUDIO
    let audio: OrchestratorOutput['audio'];
    if (skip_audio) {
      Logger.info('Phase 3: Audio skipped');
    } else {
      Logger.info('Phase 3: Audio');
      const engineer = await this.audioEngineerAgent.execute(runId, {
        script,
        hosts,
        output_path: join(output_dir, `episode.${audio_format}`),
        format: audio_format,
        pause_duration_ms,
        intro_music_path: input.intro_music_path,
        outro_music_path: input.outro_music_path,
      });
      agentTimes.audio_engineer = engineer.duration_ms;
      audio = {
        path: engineer.output.output_path,
        duration_sec: engineer.output.duration_sec,
      };
    }

    // 4. PUBLISH
    Logger.info('Phase 4: Publishing artifacts');
    const publisher = await this.publisherAgent.execute(runId, {
      script,
      stories,
      hosts,
      output_dir,
      episode_name: 'episode',
      episode_title: `Newscast Episode ${runId}`,
      pause_duration_ms,
    });
    agentTimes.publisher = publisher.duration_ms;

    const totalTime = Date.now() - startTime;
    Logger.info('✅ ORCHESTRATOR COMPLETE', {
      runId,
      total_time_ms: totalTime,
      stories: stories.length,
      lines: script.dialogue.length,
      warnings: ingestion.output.warnings.length + scriptwriter.output.warnings.length,
    });

    return {
      run_id: runId,
      stories,
      script,
      warnings: [...ingestion.output.warnings, ...scriptwriter.output.warnings],
      word_count: scriptwriter.output.word_count,
      target_word_count: scriptwriter.output.budget.target_word_count,
      files: publisher.output.files,
      ...(audio ? { audio } : {}),
      metrics: {
        total_time_ms: totalTime,
        agent_times: agentTimes,
      },
    };
  }
}
