/**
 * Tests for script display formatting
 */

import { describe, it, expect } from 'vitest';
import { formatScriptForDisplay, segmentHeading } from '../lib/script/display';
import { Script } from '../lib/types';

const RULE = '='.repeat(60);

describe('segmentHeading', () => {
  it('should upper-case the segment and replace underscores', () => {
    expect(segmentHeading('story_0')).toBe('[[ STORY 0 ]]');
    expect(segmentHeading('cold_open')).toBe('[[ COLD OPEN ]]');
  });
});

describe('formatScriptForDisplay', () => {
  it('should print the rundown and group lines by segment', () => {
    const script: Script = {
      rundown: [{ segment: 'cold_open', duration_estimate: 45 }, { segment: 'kicker' }],
      dialogue: [
        { speaker: 'Maya', text: 'Hello [src: 0]', segment: 'cold_open', sources: [0] },
        { speaker: 'Theo', text: 'Hi', segment: 'cold_open', sources: [] },
        { speaker: 'Maya', text: 'Bye', segment: 'kicker', sources: [] },
      ],
      disclaimer: 'AI generated.',
    };

    expect(formatScriptForDisplay(script).split('\n')).toEqual([
      RULE,
      'TWO-HOST NEWSCAST SCRIPT',
      RULE,
      '',
      'DISCLAIMER: AI generated.',
      '',
      'RUNDOWN:',
      '  - cold_open: ~45s',
      '  - kicker: ~0s',
      '',
      '',
      '[[ COLD OPEN ]]',
      '',
      'Maya: Hello [src: 0]',
      'Theo: Hi',
      '',
      '[[ KICKER ]]',
      '',
      'Maya: Bye',
      '',
      RULE,
    ]);
  });

  it('should omit the disclaimer when there is none', () => {
    const output = formatScriptForDisplay({ rundown: [], dialogue: [] });
    expect(output).not.toContain('DISCLAIMER');
    expect(output.split('\n')).toEqual([RULE, 'TWO-HOST NEWSCAST SCRIPT', RULE, '', 'RUNDOWN:', '', '', RULE]);
  });
});
