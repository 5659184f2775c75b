/**
 * Script validation - structural checks are fatal, quality checks are warnings
 *
 * The validator never repairs a script. A structurally valid result carries
 * a typed Script that is safe to hand to rendering; warnings are advisory and
 * the caller decides whether to regenerate.
 */

import { ScriptGenerationError } from '../errors';
import { DialogueLine, HostPair, RundownEntry, Script, Story, ValidationWarning } from '../types';
import { hasWordFloor } from './budget';
import { CITATION_PREFIX, countSpokenWords, extractCitationIds } from './citations';
import { COLD_OPEN, KICKER } from './prompts';

export const WORD_COUNT_LOW_RATIO = 0.7;
export const WORD_COUNT_HIGH_RATIO = 1.3;
export const MIN_LINES_PER_STORY = 15;
export const MIN_TOTAL_LINES = 20;

const LINE_FIELDS = ['speaker', 'text', 'segment', 'sources'] as const;

export interface ScriptValidationOptions {
  targetWordCount?: number;
  /** When set, every speaker must be one of the two host names */
  hosts?: HostPair;
  /** Warn when a line's [src: N] markers disagree with its sources list */
  checkCitations?: boolean;
}

export type ValidationReport =
  | { ok: true; script: Script; warnings: ValidationWarning[]; wordCount: number }
  | { ok: false; error: ScriptGenerationError; warnings: ValidationWarning[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(message: string): ValidationReport {
  return { ok: false, error: new ScriptGenerationError(message, 'structure'), warnings: [] };
}

/**
 * Entries without a string `segment` are left out; only the segment names
 * matter for the structural checks.
 */
function readRundown(entries: unknown[]): RundownEntry[] | string {
  const rundown: RundownEntry[] = [];
  for (const [idx, entry] of entries.entries()) {
    if (!isRecord(entry)) {
      return `Rundown entry ${idx} is not an object`;
    }
    const { segment, duration_estimate } = entry;
    if (typeof segment !== 'string') {
      continue;
    }
    rundown.push({
      segment,
      ...(typeof duration_estimate === 'number' ? { duration_estimate } : {}),
    });
  }
  return rundown;
}

function readLine(line: unknown, idx: number): DialogueLine | string {
  if (!isRecord(line)) {
    return `Dialogue line ${idx} is not an object`;
  }
  for (const field of LINE_FIELDS) {
    if (!(field in line)) {
      return `Dialogue line ${idx} missing '${field}'`;
    }
  }

  const { speaker, text, segment, sources } = line;
  if (typeof speaker !== 'string') return `Dialogue line ${idx} has invalid 'speaker'`;
  if (typeof text !== 'string') return `Dialogue line ${idx} has invalid 'text'`;
  if (typeof segment !== 'string') return `Dialogue line ${idx} has invalid 'segment'`;
  if (!Array.isArray(sources) || !sources.every(id => Number.isInteger(id))) {
    return `Dialogue line ${idx} has invalid 'sources'`;
  }

  return { speaker, text, segment, sources: sources.filter((id): id is number => typeof id === 'number') };
}

function wordCountWarning(total: number, target: number): ValidationWarning | null {
  const ratio = total / target;
  if (ratio < WORD_COUNT_LOW_RATIO) {
    return {
      code: 'script_too_short',
      message: `Script is too short: ${total} words vs target ${target} (${Math.round(ratio * 100)}%)`,
    };
  }
  if (ratio > WORD_COUNT_HIGH_RATIO) {
    return {
      code: 'script_too_long',
      message: `Script is too long: ${total} words vs target ${target} (${Math.round(ratio * 100)}%)`,
    };
  }
  return null;
}

function citationWarnings(dialogue: DialogueLine[], stories: readonly Story[]): ValidationWarning[] {
  const knownIds = new Set(stories.map(story => story.id));
  const mismatched: number[] = [];
  const unknown = new Set<number>();

  dialogue.forEach((line, idx) => {
    const marked = extractCitationIds(line.text);
    const listed = new Set(line.sources);
    if (marked.length !== listed.size || marked.some(id => !listed.has(id))) {
      mismatched.push(idx);
    }
    [...marked, ...line.sources].forEach(id => {
      if (!knownIds.has(id)) unknown.add(id);
    });
  });

  const warnings: ValidationWarning[] = [];
  if (mismatched.length > 0) {
    warnings.push({
      code: 'citation_mismatch',
      message: `${mismatched.length} dialogue line(s) have [src: N] markers that disagree with 'sources' (first: line ${mismatched[0]})`,
    });
  }
  if (unknown.size > 0) {
    warnings.push({
      code: 'unknown_citation',
      message: `Dialogue cites story ids not in the story list: ${[...unknown].sort((x, y) => x - y).join(', ')}`,
    });
  }
  return warnings;
}

export function validateScript(
  candidate: Record<string, unknown>,
  stories: readonly Story[],
  options: ScriptValidationOptions = {}
): ValidationReport {
  const { targetWordCount, hosts, checkCitations = true } = options;

  if (!('rundown' in candidate)) return fail("Script missing 'rundown' key");
  if (!('dialogue' in candidate)) return fail("Script missing 'dialogue' key");
  const { rundown: rawRundown, dialogue: rawDialogue } = candidate;
  if (!Array.isArray(rawRundown)) return fail("Script 'rundown' must be an array");

  const rundown = readRundown(rawRundown);
  if (typeof rundown === 'string') return fail(rundown);

  const segments = new Set(rundown.map(entry => entry.segment));
  if (!segments.has(COLD_OPEN)) return fail('Script missing cold_open segment');
  if (!segments.has(KICKER)) return fail('Script missing kicker segment');

  if (!Array.isArray(rawDialogue)) return fail("Script 'dialogue' must be an array");

  if (rawDialogue.length === 0) return fail("Script 'dialogue' is empty");

  const dialogue: DialogueLine[] = [];
  for (const [idx, raw] of rawDialogue.entries()) {
    const line = readLine(raw, idx);
    if (typeof line === 'string') return fail(line);
    if (hosts && !hosts.some(host => host.name === line.speaker)) {
      return fail(`Dialogue line ${idx} has unknown speaker '${line.speaker}'`);
    }
    dialogue.push(line);
  }

  const warnings: ValidationWarning[] = [];

  const wordCount = dialogue.reduce((sum, line) => sum + countSpokenWords(line.text), 0);
  if (hasWordFloor(targetWordCount)) {
    const warning = wordCountWarning(wordCount, targetWordCount);
    if (warning) warnings.push(warning);
  }

  const minExpected = stories.length * MIN_LINES_PER_STORY;
  if (dialogue.length < minExpected) {
    warnings.push({
      code: 'few_exchanges',
      message: `Script has only ${dialogue.length} dialogue lines (expected ~${minExpected}+ for conversational flow)`,
    });
  } else if (dialogue.length < MIN_TOTAL_LINES) {
    warnings.push({
      code: 'low_exchange_count',
      message: `Script may not be conversational enough (${dialogue.length} lines)`,
    });
  }

  if (!dialogue.some(line => line.text.includes(CITATION_PREFIX))) {
    warnings.push({
      code: 'missing_citations',
      message: 'Script may be missing source annotations',
    });
  }

  if (checkCitations) {
    warnings.push(...citationWarnings(dialogue, stories));
  }

  const { disclaimer } = candidate;
  const script: Script = {
    rundown,
    dialogue,
    ...(typeof disclaimer === 'string' ? { disclaimer } : {}),
  };

  return { ok: true, script, warnings, wordCount };
}

/**
 * Throwing variant for callers that want exceptions instead of a report
 */
export function assertValidScript(
  candidate: Record<string, unknown>,
  stories: readonly Story[],
  options: ScriptValidationOptions = {}
): Script {
  const report = validateScript(candidate, stories, options);
  if (!report.ok) {
    throw report.error;
  }
  return report.script;
}
