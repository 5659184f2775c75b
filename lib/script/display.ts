/**
 * Plain-text rendering of a script for the console and script.txt
 */

import { Script } from '../types';

const RULE = '='.repeat(60);

export function segmentHeading(segment: string): string {
  return `[[ ${segment.toUpperCase().replace(/_/g, ' ')} ]]`;
}

export function formatScriptForDisplay(script: Script): string {
  const output: string[] = [RULE, 'TWO-HOST NEWSCAST SCRIPT', RULE, ''];

  if (script.disclaimer) {
    output.push(`DISCLAIMER: ${script.disclaimer}`, '');
  }

  output.push('RUNDOWN:');
  for (const entry of script.rundown) {
    output.push(`  - ${entry.segment}: ~${entry.duration_estimate ?? 0}s`);
  }
  output.push('');

  let currentSegment: string | null = null;
  for (const line of script.dialogue) {
    if (line.segment !== currentSegment) {
      output.push('', segmentHeading(line.segment), '');
      currentSegment = line.segment;
    }
    output.push(`${line.speaker}: ${line.text}`);
  }

  output.push('', RULE);
  return output.join('\n');
}
