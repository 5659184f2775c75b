/**
 * Tests for transcript, subtitle and show-notes writers
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  buildShowNotes,
  buildTranscriptJsonl,
  buildVttSubtitles,
  calculateLineTimestamps,
  formatTimestampVtt,
  writeAllOutputs,
} from '../lib/tools/output-writer';
import { OutputWriterError } from '../lib/errors';
import { HostPair, Script, Story } from '../lib/types';

const hosts: HostPair = [
  { name: 'Maya', personality: 'Curious.', style: 'Quick.' },
  { name: 'Theo', personality: 'Skeptical.', style: 'Measured.' },
];

const timedScript: Script = {
  rundown: [{ segment: 'cold_open' }, { segment: 'kicker' }],
  dialogue: [
    { speaker: 'Maya', text: 'one two three four five', segment: 'cold_open', sources: [] },
    { speaker: 'Theo', text: 'Six seven [src: 0]', segment: 'cold_open', sources: [0] },
    { speaker: 'Maya', text: '   ', segment: 'kicker', sources: [] },
    { speaker: 'Theo', text: 'eight', segment: 'kicker', sources: [] },
  ],
};

const stories: Story[] = [0, 1, 2].map(id => ({
  id,
  title: `Story ${id}`,
  url: `https://example.com/${id}`,
  source: 'Example Wire',
  summary: id === 2 ? 'x'.repeat(400) : `Summary ${id}.`,
}));

describe('formatTimestampVtt', () => {
  it('should format hours, minutes, seconds and milliseconds', () => {
    expect(formatTimestampVtt(0)).toBe('00:00:00.000');
    expect(formatTimestampVtt(3661.5)).toBe('01:01:01.500');
    expect(formatTimestampVtt(59.9996)).toBe('00:01:00.000');
  });
});

describe('calculateLineTimestamps', () => {
  it('should time lines at 2.5 words per second with pauses between them', () => {
    const timed = calculateLineTimestamps(timedScript, 1000);

    expect(timed.map(line => line.text)).toEqual(['one two three four five', 'Six seven [src: 0]', 'eight']);
    expect(timed[0].start_time).toBe(0);
    expect(timed[0].end_time).toBe(2);
    expect(timed[1].start_time).toBe(3);
    expect(timed[1].end_time).toBeCloseTo(3.8, 10);
    expect(timed[2].start_time).toBeCloseTo(4.8, 10);
    expect(timed[2].end_time).toBeCloseTo(5.2, 10);
  });

  it('should use the configured pause', () => {
    const timed = calculateLineTimestamps(timedScript, 500);
    expect(timed[1].start_time).toBe(2.5);
  });

  it('should skip lines that hold only a citation marker', () => {
    const timed = calculateLineTimestamps({
      rundown: timedScript.rundown,
      dialogue: [
        { speaker: 'Maya', text: 'one two three', segment: 'cold_open', sources: [] },
        { speaker: 'Theo', text: '[src: 0]', segment: 'cold_open', sources: [0] },
        { speaker: 'Maya', text: 'four five six', segment: 'kicker', sources: [] },
      ],
    }, 1000);

    expect(timed.map(line => line.text)).toEqual(['one two three', 'four five six']);
    expect(timed[0].end_time).toBeCloseTo(1.2, 10);
    expect(timed[1].start_time).toBeCloseTo(2.2, 10);
    expect(timed[1].end_time).toBeCloseTo(3.4, 10);
  });
});

describe('buildTranscriptJsonl', () => {
  it('should write one JSON object per spoken line', () => {
    const rows = buildTranscriptJsonl(timedScript).trimEnd().split('\n').map(row => JSON.parse(row));

    expect(rows).toEqual([
      { t: 0, speaker: 'Maya', text: 'one two three four five', src: [] },
      { t: 3, speaker: 'Theo', text: 'Six seven [src: 0]', src: [0] },
      { t: 4.8, speaker: 'Theo', text: 'eight', src: [] },
    ]);
  });
});

describe('buildVttSubtitles', () => {
  it('should write numbered cues without citation markers', () => {
    expect(buildVttSubtitles(timedScript)).toBe(
      'WEBVTT\n' +
      '\n' +
      '1\n00:00:00.000 --> 00:00:02.000\n<v Maya>one two three four five\n' +
      '\n' +
      '2\n00:00:03.000 --> 00:00:03.800\n<v Theo>Six seven\n' +
      '\n' +
      '3\n00:00:04.800 --> 00:00:05.200\n<v Theo>eight\n'
    );
  });
});

describe('buildShowNotes', () => {
  const script: Script = {
    rundown: [{ segment: 'cold_open' }, { segment: 'kicker' }],
    dialogue: [
      { speaker: 'Maya', text: 'Big news [src: 2]', segment: 'cold_open', sources: [2] },
      { speaker: 'Theo', text: 'Also this [src: 0]', segment: 'kicker', sources: [0] },
    ],
    disclaimer: 'Not financial advice.',
  };

  it('should cover only cited stories in id order', () => {
    const notes = buildShowNotes(script, stories, hosts);

    expect(notes.startsWith('# Newscast Episode\n')).toBe(true);
    expect(notes).toContain("Join Maya and Theo as they talk through today's top stories. Maya: Curious. Theo: Skeptical.");
    expect(notes).toContain('### Story 0');
    expect(notes).not.toContain('### Story 1');
    expect(notes.indexOf('### Story 0')).toBeLessThan(notes.indexOf('### Story 2'));
    expect(notes).toContain(
      '## All Sources\n\n1. [Story 0](https://example.com/0) - Example Wire\n2. [Story 2](https://example.com/2) - Example Wire\n'
    );
  });

  it('should truncate long summaries to 300 characters', () => {
    const notes = buildShowNotes(script, stories, hosts);
    expect(notes).toContain(`\n${'x'.repeat(297)}...\n`);
    expect(notes).not.toContain('x'.repeat(298));
  });

  it('should list hosts and the script disclaimer', () => {
    const notes = buildShowNotes(script, stories, hosts, 'Morning Edition');

    expect(notes.startsWith('# Morning Edition\n')).toBe(true);
    expect(notes).toContain('## Hosts\n\n- **Maya**: Curious.\n- **Theo**: Skeptical.\n');
    expect(notes).toContain('## Disclaimer\n\nNot financial advice.\n');
  });
});

describe('writeAllOutputs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'newscast-outputs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write every artifact into the output directory', async () => {
    const outputDir = join(dir, 'episode-1');
    const paths = await writeAllOutputs({
      script: timedScript,
      stories,
      hosts,
      outputDir,
      episodeName: 'today',
    });

    expect(paths).toEqual({
      stories: join(outputDir, 'stories.json'),
      script_json: join(outputDir, 'script.json'),
      script_txt: join(outputDir, 'script.txt'),
      transcript_jsonl: join(outputDir, 'transcript.jsonl'),
      vtt: join(outputDir, 'today.vtt'),
      show_notes: join(outputDir, 'show_notes.md'),
    });

    expect(JSON.parse(await readFile(paths.script_json, 'utf-8'))).toEqual(timedScript);
    expect(JSON.parse(await readFile(paths.stories, 'utf-8'))).toEqual(stories);
    expect(await readFile(paths.vtt, 'utf-8')).toBe(buildVttSubtitles(timedScript));
    expect(await readFile(paths.transcript_jsonl, 'utf-8')).toBe(buildTranscriptJsonl(timedScript));
  });

  it('should raise an output error when the directory cannot be created', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'not a directory');

    await expect(writeAllOutputs({
      script: timedScript,
      stories,
      hosts,
      outputDir: join(blocker, 'sub'),
    })).rejects.toBeInstanceOf(OutputWriterError);
  });
});
