/**
 * Run Profile Store
 *
 * Named run configurations, referenced by `configRef` in start requests.
 * The supervisor only reads; the file may be edited by other tools at any
 * time, so FileProfileStore reads it on every call.
 *
 * File format:
 *   { "profiles": { "<ref>": { "command": "...", "args": [...], ... } } }
 */

import * as fs from 'fs';
import { ErrorCode } from '../errors/error-codes';
import { SupervisorError } from '../errors/supervisor-error';
import { RunConfig, RunConfigDefaults, validateRunConfig } from '../models/run-config';

/**
 * Read-only key-value store of raw (unvalidated) profiles
 */
export interface ProfileStore {
  get(ref: string): Promise<unknown | undefined>;
  list(): Promise<string[]>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class FileProfileStore implements ProfileStore {
  constructor(readonly filePath: string) {}

  async get(ref: string): Promise<unknown | undefined> {
    const profiles = await this.read();
    return Object.prototype.hasOwnProperty.call(profiles, ref) ? profiles[ref] : undefined;
  }

  async list(): Promise<string[]> {
    return Object.keys(await this.read()).sort();
  }

  private async read(): Promise<Record<string, unknown>> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      // No file yet means no profiles
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new SupervisorError(
        ErrorCode.E101_INVALID_CONFIG,
        `${this.filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!isRecord(parsed)) {
      throw new SupervisorError(ErrorCode.E101_INVALID_CONFIG, `${this.filePath}: top level must be an object`);
    }
    if (parsed.profiles === undefined) {
      return {};
    }
    if (!isRecord(parsed.profiles)) {
      throw new SupervisorError(ErrorCode.E101_INVALID_CONFIG, `${this.filePath}: "profiles" must be an object`);
    }
    return parsed.profiles;
  }
}

/**
 * Profiles held in memory (embedding, tests)
 */
export class InMemoryProfileStore implements ProfileStore {
  private readonly profiles: Map<string, unknown>;

  constructor(profiles: Record<string, unknown> = {}) {
    this.profiles = new Map(Object.entries(profiles));
  }

  async get(ref: string): Promise<unknown | undefined> {
    return this.profiles.get(ref);
  }

  async list(): Promise<string[]> {
    return [...this.profiles.keys()].sort();
  }

  set(ref: string, profile: unknown): void {
    this.profiles.set(ref, profile);
  }

  delete(ref: string): boolean {
    return this.profiles.delete(ref);
  }
}

/**
 * Resolve a reference and validate it into a RunConfig
 * @throws SupervisorError E101 for a blank reference or an invalid profile
 * @throws SupervisorError E102 when the reference does not exist
 */
export async function loadRunConfig(
  store: ProfileStore,
  ref: string,
  defaults: RunConfigDefaults
): Promise<RunConfig> {
  if (ref.trim() === '') {
    throw new SupervisorError(ErrorCode.E101_INVALID_CONFIG, 'configRef must be a non-empty string');
  }
  const raw = await store.get(ref);
  if (raw === undefined) {
    throw new SupervisorError(ErrorCode.E102_CONFIG_NOT_FOUND, ref, { configRef: ref });
  }
  return validateRunConfig(raw, defaults);
}
