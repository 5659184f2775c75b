/**
 * Host persona loading and validation
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { InputError, errorMessage } from './errors';
import { HostPair, Persona, TTS_VOICES } from './types';

const PersonaSchema = z.object({
  name: z.string().trim().min(1),
  personality: z.string().trim().min(1),
  style: z.string().trim().min(1),
  voice: z.enum(TTS_VOICES).optional(),
});

const PersonasFileSchema = z.object({
  hosts: z.array(PersonaSchema),
});

/**
 * Exactly two hosts with distinct names; the names double as speaker keys.
 */
export function createHostPair(hosts: readonly Persona[]): HostPair {
  if (hosts.length !== 2) {
    throw new InputError(`Need exactly 2 host personas, got ${hosts.length}`);
  }
  const [first, second] = hosts;
  if (first.name === second.name) {
    throw new InputError(`Host names must be unique, both are '${first.name}'`);
  }
  return [first, second];
}

export function parsePersonas(data: unknown): HostPair {
  const result = PersonasFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InputError(`Invalid personas file: ${issues}`);
  }
  return createHostPair(result.data.hosts);
}

export async function loadPersonas(path: string): Promise<HostPair> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new InputError(`Personas file not found: ${path}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new InputError(`Personas file is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  return parsePersonas(data);
}
