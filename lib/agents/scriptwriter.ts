/**
 * Scriptwriter Agent - Turns the selected stories into a two-host dialogue
 *
 * One Dialogue Model call per execution and no retry: a malformed reply
 * surfaces as a ScriptGenerationError and the caller decides whether to
 * regenerate.
 */

import { BaseAgent } from './base';
import { Config } from '../config';
import { InputError } from '../errors';
import { HostPair, Script, Story, ValidationWarning, WordBudget } from '../types';
import { createHostPair } from '../personas';
import { ChatModel, OpenAiChatModel } from '../tools/llm';
import { computeWordBudget } from '../script/budget';
import { composePrompt } from '../script/prompts';
import { parseModelReply } from '../script/parser';
import { validateScript } from '../script/validator';
import { Logger } from '../utils';

export interface ScriptwriterInput {
  stories: Story[];
  hosts: HostPair;
  target_duration_min: number;
  profanity_filter: boolean;
}

export interface ScriptwriterOutput {
  script: Script;
  warnings: ValidationWarning[];
  budget: WordBudget;
  word_count: number;
}

export class ScriptwriterAgent extends BaseAgent<ScriptwriterInput, ScriptwriterOutput> {
  private model: ChatModel;

  constructor(model: ChatModel = new OpenAiChatModel()) {
    super({
      name: 'ScriptwriterAgent',
    });

    this.model = model;
  }

  protected async process(input: ScriptwriterInput): Promise<ScriptwriterOutput> {
    const { stories, target_duration_min, profanity_filter } = input;

    // Fail before spending a model call
    if (stories.length < 1) {
      throw new InputError('Need at least 1 story to generate script');
    }
    const hosts = createHostPair(input.hosts);

    const budget = computeWordBudget(target_duration_min);
    const prompt = composePrompt({
      hosts,
      stories,
      targetDurationMin: target_duration_min,
      targetWordCount: budget.target_word_count,
      profanityFilter: profanity_filter,
    });

    Logger.info('Writing script', {
      stories: stories.length,
      target_duration_min,
      target_word_count: budget.target_word_count,
      estimated_lines: budget.estimated_lines,
    });

    const reply = await this.model.complete({
      system: prompt.system,
      user: prompt.user,
      temperature: Config.SCRIPT_TEMPERATURE,
      maxTokens: Config.SCRIPT_MAX_TOKENS,
      json: true,
    });

    const parsed = parseModelReply(reply);
    if (!parsed.ok) {
      throw parsed.error;
    }

    const report = validateScript(parsed.value, stories, {
      targetWordCount: budget.target_word_count,
      hosts,
    });
    report.warnings.forEach(warning => Logger.warn(warning.message, { code: warning.code }));

    if (!report.ok) {
      throw report.error;
    }

    Logger.info('Script complete', {
      lines: report.script.dialogue.length,
      word_count: report.wordCount,
      target_word_count: budget.target_word_count,
      warnings: report.warnings.length,
    });

    return {
      script: report.script,
      warnings: report.warnings,
      budget,
      word_count: report.wordCount,
    };
  }
}
