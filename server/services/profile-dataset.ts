/**
 * DATA ACCESS: Profile Dataset Sources
 *
 * @fileoverview Candidate profiles come from a ProfileSource. The JSON file
 * source re-reads its file on every load so edits to the dataset apply to the
 * next request. An unreadable or malformed file is a failure; a valid file
 * holding an empty list is a success with no profiles.
 *
 * @example
 * ```typescript
 * const source = new JsonFileProfileSource('server/data/profiles.json');
 * const dataset = await source.load();
 * if (isSuccess(dataset)) {
 *   console.log(dataset.data.length);
 * }
 * ```
 */

import { readFile } from 'fs/promises';
import { ZodError } from 'zod';
import { logger } from '../config/logger';
import { success, failure, type Result } from '../../shared/result-types';
import { ProfileDatasetUnavailableError } from '../../shared/errors';
import { profileDatasetSchema, type Profile } from '../../shared/schema';

export type ProfileDatasetResult = Result<Profile[], ProfileDatasetUnavailableError>;

export interface ProfileSource {
  /** Human-readable origin, used in logs and error details */
  readonly description: string;
  load(): Promise<ProfileDatasetResult>;
}

function formatIssues(error: ZodError): string[] {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate an already parsed JSON value as a profile dataset
 */
export function parseProfileDataset(source: string, raw: unknown): ProfileDatasetResult {
  const parsed = profileDatasetSchema.safeParse(raw);
  if (!parsed.success) {
    return failure(ProfileDatasetUnavailableError.invalidStructure(source, formatIssues(parsed.error)));
  }
  return success(parsed.data);
}

export class JsonFileProfileSource implements ProfileSource {
  constructor(private readonly filePath: string) {}

  get description(): string {
    return this.filePath;
  }

  async load(): Promise<ProfileDatasetResult> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf8');
    } catch (error) {
      logger.error({ err: error, path: this.filePath }, 'Profile dataset could not be read');
      return failure(ProfileDatasetUnavailableError.unreadable(this.filePath, error));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      logger.error({ err: error, path: this.filePath }, 'Profile dataset is not valid JSON');
      return failure(ProfileDatasetUnavailableError.invalidJson(this.filePath, error));
    }

    const result = parseProfileDataset(this.filePath, raw);
    if (result.success) {
      logger.debug({ path: this.filePath, profiles: result.data.length }, 'Profile dataset loaded');
    } else {
      logger.error({ path: this.filePath, details: result.error.details }, 'Profile dataset has an invalid structure');
    }
    return result;
  }
}

/**
 * Holds profiles (or a fixed load failure) in memory
 */
export class InMemoryProfileSource implements ProfileSource {
  readonly description = 'in-memory';

  constructor(private readonly dataset: Profile[] | ProfileDatasetUnavailableError) {}

  async load(): Promise<ProfileDatasetResult> {
    if (this.dataset instanceof ProfileDatasetUnavailableError) {
      return failure(this.dataset);
    }
    return success([...this.dataset]);
  }
}
