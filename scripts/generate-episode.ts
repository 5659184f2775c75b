#!/usr/bin/env node
/**
 * Generate a two-host newscast episode
 *
 * Usage:
 *   npm run generate -- --personas config/personas.example.json --minutes 5 --topics "ai,climate"
 *   npm run generate -- --personas config/personas.example.json --skip-audio
 */

import 'dotenv/config';
import { parseArgs } from 'util';
import { Config } from '../lib/config';
import { InputError, PipelineError, errorMessage } from '../lib/errors';
import { AudioFormat } from '../lib/types';
import { loadPersonas } from '../lib/personas';
import { Orchestrator } from '../lib/orchestrator';
import { formatScriptForDisplay } from '../lib/script/display';

const USAGE = `Usage: newscast --personas <file> [options]

Options:
  --personas <file>         JSON file with exactly two host personas (required)
  --minutes <n>             Target episode length in minutes (default: 5)
  --topics <list>           Comma-separated news topics (default: general)
  --region <code>           Country code for the top-headlines fallback (default: us)
  --profanity-filter        Ask the hosts to keep it clean
  --output-dir <dir>        Where to write audio and artifacts (default: out)
  --audio-format <fmt>      mp3 or wav (default: mp3)
  --pause-duration <ms>     Silence between dialogue lines (default: 1000)
  --intro-music <file>      Music bed under the first 5 seconds
  --outro-music <file>      Music bed under the last 5 seconds
  --skip-audio              Write the script and artifacts only
  -h, --help                Show this help`;

export interface CliOptions {
  personas: string;
  minutes: number;
  topics: string[];
  region: string;
  profanityFilter: boolean;
  outputDir: string;
  audioFormat: AudioFormat;
  pauseDurationMs: number;
  introMusic?: string;
  outroMusic?: string;
  skipAudio: boolean;
}

function positiveNumber(flag: string, raw: string, integer: boolean): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new InputError(`--${flag} must be a positive ${integer ? 'integer' : 'number'}, got '${raw}'`);
  }
  return value;
}

function audioFormat(raw: string): AudioFormat {
  if (raw === 'mp3' || raw === 'wav') {
    return raw;
  }
  throw new InputError(`--audio-format must be mp3 or wav, got '${raw}'`);
}

/**
 * Returns null when help was requested
 */
export function parseCliArgs(argv: string[]): CliOptions | null {
  const { values } = parseArgs({
    args: argv,
    options: {
      personas: { type: 'string' },
      minutes: { type: 'string' },
      topics: { type: 'string' },
      region: { type: 'string' },
      'profanity-filter': { type: 'boolean' },
      'output-dir': { type: 'string' },
      'audio-format': { type: 'string' },
      'pause-duration': { type: 'string' },
      'intro-music': { type: 'string' },
      'outro-music': { type: 'string' },
      'skip-audio': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
  });

  if (values.help) {
    return null;
  }
  if (!values.personas) {
    throw new InputError('--personas is required');
  }

  const topics = (values.topics ?? 'general')
    .split(',')
    .map(topic => topic.trim())
    .filter(Boolean);

  return {
    personas: values.personas,
    minutes: positiveNumber('minutes', values.minutes ?? '5', false),
    topics: topics.length > 0 ? topics : ['general'],
    region: values.region ?? 'us',
    profanityFilter: values['profanity-filter'] ?? false,
    outputDir: values['output-dir'] ?? 'out',
    audioFormat: audioFormat(values['audio-format'] ?? 'mp3'),
    pauseDurationMs: positiveNumber('pause-duration', values['pause-duration'] ?? '1000', true),
    introMusic: values['intro-music'],
    outroMusic: values['outro-music'],
    skipAudio: values['skip-audio'] ?? false,
  };
}

async function main(): Promise<number> {
  let options: CliOptions | null;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}\n\n${USAGE}`);
    return 2;
  }
  if (!options) {
    console.log(USAGE);
    return 0;
  }

  try {
    Config.requireKeys(['NEWSAPI_KEY', 'OPENAI_API_KEY']);
    const hosts = await loadPersonas(options.personas);

    console.log(`\n🎙️  Generating a ${options.minutes}-minute episode with ${hosts[0].name} and ${hosts[1].name}\n`);

    const result = await new Orchestrator().run({
      hosts,
      target_duration_min: options.minutes,
      topics: options.topics,
      region: options.region,
      profanity_filter: options.profanityFilter,
      output_dir: options.outputDir,
      audio_format: options.audioFormat,
      pause_duration_ms: options.pauseDurationMs,
      intro_music_path: options.introMusic,
      outro_music_path: options.outroMusic,
      skip_audio: options.skipAudio,
    });

    console.log(`\n${formatScriptForDisplay(result.script)}\n`);

    console.log('📊 Summary:');
    console.log(`   Run: ${result.run_id}`);
    console.log(`   Stories: ${result.stories.length}`);
    console.log(`   Dialogue lines: ${result.script.dialogue.length}`);
    console.log(`   Words: ${result.word_count} (target ${result.target_word_count})`);
    if (result.audio) {
      console.log(`   Audio: ${result.audio.path} (${result.audio.duration_sec.toFixed(1)}s)`);
    }
    for (const path of Object.values(result.files)) {
      console.log(`   File: ${path}`);
    }
    if (result.warnings.length > 0) {
      console.log('\n⚠️  Warnings:');
      result.warnings.forEach(warning => console.log(`   - ${warning.message}`));
    }

    console.log('\n✅ Done!\n');
    return 0;
  } catch (error) {
    const label = error instanceof PipelineError ? error.name : 'Error';
    console.error(`\n❌ ${label}: ${errorMessage(error)}`);
    return 1;
  }
}

// Run if called directly
if (require.main === module) {
  main().then(code => {
    process.exitCode = code;
  });
}
