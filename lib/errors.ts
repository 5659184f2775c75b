/**
 * Error taxonomy for the newscast pipeline
 *
 * Every fatal condition surfaces as a PipelineError subclass so callers can
 * tell "my input was bad" apart from "a dependency failed".
 */

export type ErrorKind = 'input' | 'parse' | 'structure' | 'collaborator' | 'output';

export abstract class PipelineError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InputError extends PipelineError {
  readonly kind = 'input' as const;
}

/**
 * Story list failed validation (empty, or a story with a missing/empty field)
 */
export class ValidationError extends PipelineError {
  readonly kind = 'input' as const;
}

export class ScriptGenerationError extends PipelineError {
  readonly kind: 'parse' | 'structure';

  constructor(message: string, kind: 'parse' | 'structure', options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
  }
}

export class NewsSourceError extends PipelineError {
  readonly kind = 'collaborator' as const;
}

export class DialogueModelError extends PipelineError {
  readonly kind = 'collaborator' as const;
}

export class AudioRenderError extends PipelineError {
  readonly kind = 'collaborator' as const;
}

export class OutputWriterError extends PipelineError {
  readonly kind = 'output' as const;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
