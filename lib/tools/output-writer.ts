/**
 * Output writers - transcript, subtitles, show notes and script artifacts
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { OutputWriterError, errorMessage } from '../errors';
import { HostPair, Script, Story, TimedLine } from '../types';
import { truncate } from '../utils';
import { WORDS_PER_MINUTE } from '../script/budget';
import { countSpokenWords, stripCitations } from '../script/citations';
import { formatScriptForDisplay } from '../script/display';

const WORDS_PER_SECOND = WORDS_PER_MINUTE / 60;
const SHOW_NOTES_SUMMARY_LIMIT = 300;

export function formatTimestampVtt(seconds: number): string {
  const totalMs = Math.round(seconds * 1000);
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const secs = Math.floor((totalMs % 60_000) / 1000);
  const ms = totalMs % 1000;

  const pad = (value: number, width: number) => String(value).padStart(width, '0');
  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(secs, 2)}.${pad(ms, 3)}`;
}

/**
 * Estimated line timings at the speaking rate, with a pause after every line
 * but the last. Lines with nothing to speak once citation markers are removed
 * are skipped, matching the rendered audio.
 */
export function calculateLineTimestamps(script: Script, pauseDurationMs = 1000): TimedLine[] {
  const timed: TimedLine[] = [];
  let current = 0;

  script.dialogue.forEach((line, idx) => {
    if (!stripCitations(line.text)) {
      return;
    }

    const duration = countSpokenWords(line.text) / WORDS_PER_SECOND;
    timed.push({ ...line, start_time: current, end_time: current + duration });

    current += duration;
    if (idx < script.dialogue.length - 1) {
      current += pauseDurationMs / 1000;
    }
  });

  return timed;
}

export function buildTranscriptJsonl(script: Script, pauseDurationMs = 1000): string {
  return calculateLineTimestamps(script, pauseDurationMs)
    .map(line => JSON.stringify({
      t: Math.round(line.start_time * 1000) / 1000,
      speaker: line.speaker,
      text: line.text,
      src: line.sources,
    }) + '\n')
    .join('');
}

export function buildVttSubtitles(script: Script, pauseDurationMs = 1000): string {
  const cues = calculateLineTimestamps(script, pauseDurationMs).map((line, idx) =>
    `${idx + 1}\n${formatTimestampVtt(line.start_time)} --> ${formatTimestampVtt(line.end_time)}\n<v ${line.speaker}>${stripCitations(line.text)}\n`
  );
  return ['WEBVTT\n', ...cues].join('\n');
}

export function buildShowNotes(
  script: Script,
  stories: readonly Story[],
  hosts: HostPair,
  episodeTitle = 'Newscast Episode'
): string {
  const [a, b] = hosts;
  const byId = new Map(stories.map(story => [story.id, story]));

  const cited = new Set<number>();
  script.dialogue.forEach(line => line.sources.forEach(id => cited.add(id)));
  const citedStories = [...cited]
    .sort((x, y) => x - y)
    .map(id => byId.get(id))
    .filter((story): story is Story => story !== undefined);

  const out: string[] = [
    `# ${episodeTitle}`,
    '',
    '## Episode Description',
    '',
    `Join ${a.name} and ${b.name} as they talk through today's top stories. ${a.name}: ${a.personality} ${b.name}: ${b.personality}`,
    '',
    '## Topics Covered',
    '',
  ];

  for (const story of citedStories) {
    out.push(`### ${story.title}`, '', `**Source**: ${story.source}`, '');
    const summary = story.summary.trim();
    if (summary) {
      out.push(truncate(summary, SHOW_NOTES_SUMMARY_LIMIT), '');
    }
    out.push(`**Read more**: [${story.url}](${story.url})`, '');
  }

  out.push('## All Sources', '');
  citedStories.forEach((story, idx) => {
    out.push(`${idx + 1}. [${story.title}](${story.url}) - ${story.source}`);
  });
  out.push('');

  out.push('## Hosts', '');
  for (const host of hosts) {
    out.push(`- **${host.name}**: ${host.personality}`);
  }
  out.push('', '---', '', '## Disclaimer', '');
  if (script.disclaimer) {
    out.push(script.disclaimer, '');
  }
  out.push(
    'This episode was generated with AI for informational and entertainment purposes. The voices are synthetic and the host personalities are fictional.',
    '',
    '- All facts are sourced from the cited news articles above',
    '- This is not professional advice (financial, medical, or legal)',
    '- Sources are provided for fact-checking and attribution',
    ''
  );

  return out.join('\n');
}

export interface OutputPaths {
  stories: string;
  script_json: string;
  script_txt: string;
  transcript_jsonl: string;
  vtt: string;
  show_notes: string;
}

export interface WriteOutputsOptions {
  script: Script;
  stories: readonly Story[];
  hosts: HostPair;
  outputDir: string;
  episodeName?: string;
  episodeTitle?: string;
  pauseDurationMs?: number;
}

async function writeText(path: string, content: string): Promise<string> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
    return path;
  } catch (error) {
    throw new OutputWriterError(`Failed to write ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

export async function writeAllOutputs(options: WriteOutputsOptions): Promise<OutputPaths> {
  const {
    script,
    stories,
    hosts,
    outputDir,
    episodeName = 'episode',
    episodeTitle,
    pauseDurationMs = 1000,
  } = options;

  return {
    stories: await writeText(join(outputDir, 'stories.json'), JSON.stringify(stories, null, 2)),
    script_json: await writeText(join(outputDir, 'script.json'), JSON.stringify(script, null, 2)),
    script_txt: await writeText(join(outputDir, 'script.txt'), formatScriptForDisplay(script)),
    transcript_jsonl: await writeText(join(outputDir, 'transcript.jsonl'), buildTranscriptJsonl(script, pauseDurationMs)),
    vtt: await writeText(join(outputDir, `${episodeName}.vtt`), buildVttSubtitles(script, pauseDurationMs)),
    show_notes: await writeText(join(outputDir, 'show_notes.md'), buildShowNotes(script, stories, hosts, episodeTitle)),
  };
}
