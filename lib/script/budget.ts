/**
 * Duration budgeting - converts a target episode length into a spoken word
 * target, net of the silence inserted between dialogue lines
 */

import { WordBudget } from '../types';

export const WORDS_PER_MINUTE = 150;
export const LINES_PER_MINUTE = 8;
export const PAUSE_SECONDS_PER_LINE = 1.0;

export interface BudgetOptions {
  wordsPerMinute?: number;
  linesPerMinute?: number;
  pauseSecondsPerLine?: number;
}

/**
 * Not clamped: very short targets can yield a zero or negative word count,
 * which downstream code treats as "no minimum".
 */
export function computeWordBudget(targetDurationMin: number, options: BudgetOptions = {}): WordBudget {
  const {
    wordsPerMinute = WORDS_PER_MINUTE,
    linesPerMinute = LINES_PER_MINUTE,
    pauseSecondsPerLine = PAUSE_SECONDS_PER_LINE,
  } = options;

  const estimatedLines = targetDurationMin * linesPerMinute;
  const pauseSeconds = estimatedLines * pauseSecondsPerLine;
  const effectiveSpeechSeconds = targetDurationMin * 60 - pauseSeconds;

  // Work in seconds: 5 min must floor to 650, not 649
  return {
    target_duration_min: targetDurationMin,
    estimated_lines: estimatedLines,
    pause_minutes: pauseSeconds / 60,
    effective_speech_minutes: effectiveSpeechSeconds / 60,
    target_word_count: Math.floor((effectiveSpeechSeconds * wordsPerMinute) / 60),
  };
}

export function hasWordFloor(targetWordCount: number | undefined): targetWordCount is number {
  return targetWordCount !== undefined && targetWordCount > 0;
}
