/**
 * Publisher Agent - Writes the episode's companion artifacts to disk
 */

import { BaseAgent } from './base';
import { HostPair, Script, Story } from '../types';
import { OutputPaths, writeAllOutputs } from '../tools/output-writer';
import { Logger } from '../utils';

export interface PublisherInput {
  script: Script;
  stories: Story[];
  hosts: HostPair;
  output_dir: string;
  episode_name: string;
  episode_title?: string;
  pause_duration_ms: number;
}

export interface PublisherOutput {
  files: OutputPaths;
}

export class PublisherAgent extends BaseAgent<PublisherInput, PublisherOutput> {
  constructor() {
    super({
      name: 'PublisherAgent',
      retries: 2,
      retryDelayMs: 500,
    });
  }

  protected async process(input: PublisherInput): Promise<PublisherOutput> {
    Logger.info('Writing episode artifacts', { output_dir: input.output_dir });

    const files = await writeAllOutputs({
      script: input.script,
      stories: input.stories,
      hosts: input.hosts,
      outputDir: input.output_dir,
      episodeName: input.episode_name,
      episodeTitle: input.episode_title,
      pauseDurationMs: input.pause_duration_ms,
    });

    Logger.info('Artifacts written', { ...files });

    return { files };
  }
}
