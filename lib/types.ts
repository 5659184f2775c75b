/**
 * Core type definitions for the newscast generation system
 */

/**
 * Raw news item as returned by the News Source. Nothing is guaranteed.
 */
export interface Article {
  title?: string;
  url?: string;
  sourceName?: string;
  description?: string;
  content?: string;
  publishedAt?: string;
}

/**
 * A selected, normalized news item. `id` is the citation target used by
 * `[src: N]` markers and `sources` arrays, so it is stable within a run.
 */
export interface Story {
  readonly id: number;
  readonly title: string;
  readonly url: string;
  readonly source: string;
  readonly summary: string;
  readonly publishedAt?: string;
}

export const TTS_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

export type TtsVoice = (typeof TTS_VOICES)[number];

export interface Persona {
  name: string;
  personality: string;
  style: string;
  voice?: TtsVoice;
}

export type HostPair = readonly [Persona, Persona];

export interface RundownEntry {
  segment: string;
  duration_estimate?: number;
}

export interface DialogueLine {
  speaker: string;
  text: string;
  segment: string;
  sources: number[];
}

export interface Script {
  rundown: RundownEntry[];
  dialogue: DialogueLine[];
  disclaimer?: string;
}

export type WarningCode =
  | 'few_stories'
  | 'script_too_short'
  | 'script_too_long'
  | 'few_exchanges'
  | 'low_exchange_count'
  | 'missing_citations'
  | 'citation_mismatch'
  | 'unknown_citation';

export interface ValidationWarning {
  code: WarningCode;
  message: string;
}

export interface WordBudget {
  target_duration_min: number;
  estimated_lines: number;
  pause_minutes: number;
  effective_speech_minutes: number;
  target_word_count: number;
}

export interface TimedLine extends DialogueLine {
  start_time: number;
  end_time: number;
}

export type AudioFormat = 'mp3' | 'wav';

export interface AgentMessage<I, O> {
  agent: string;
  run_id: string;
  timestamp: string;
  input: I;
  output: O;
  duration_ms: number;
}
