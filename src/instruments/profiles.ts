/**
 * Instrument profiles loaded from config/instruments/<name>.json
 */

import { existsSync, readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { createChildLogger } from '@/utils/logger';
import { validateInstrumentProfile } from '@/validation/ajv_instance';
import type { InstrumentProfile } from './types';

const logger = createChildLogger('instrument_profiles');

export class ProfileError extends Error {
  constructor(
    message: string,
    public profile: string,
    public details: string[] = []
  ) {
    super(message);
    this.name = 'ProfileError';
  }
}

const profileCache = new Map<string, InstrumentProfile>();

function profileDir(): string {
  return join(process.cwd(), 'config', 'instruments');
}

export function listProfiles(dir: string = profileDir()): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter((file) => file.endsWith('.json'))
    .map((file) => file.replace(/\.json$/, ''))
    .sort();
}

/**
 * Throws ProfileError for unknown names and files that fail schema validation.
 */
export function loadProfile(name: string, dir: string = profileDir()): InstrumentProfile {
  const key = `${dir}::${name}`;
  const cached = profileCache.get(key);
  if (cached) return cached;

  const filePath = join(dir, `${name}.json`);
  if (!/^[a-z][a-z0-9_-]*$/.test(name) || !existsSync(filePath)) {
    throw new ProfileError(
      `Unsupported instrument profile "${name}" (available: ${listProfiles(dir).join(', ') || 'none'})`,
      name
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ProfileError(`Instrument profile "${name}" is not valid JSON: ${message}`, name);
  }

  const validation = validateInstrumentProfile(raw);
  if (!validation.valid) {
    throw new ProfileError(`Instrument profile "${name}" failed validation`, name, validation.errors);
  }
  if (validation.data.name !== name) {
    throw new ProfileError(
      `Instrument profile file "${name}.json" declares name "${validation.data.name}"`,
      name
    );
  }

  logger.debug({ profile: name }, 'Loaded instrument profile');
  profileCache.set(key, validation.data);
  return validation.data;
}

export function resetProfileCache(): void {
  profileCache.clear();
}
