/**
 * BUSINESS LOGIC: Candidate Matching
 *
 * @fileoverview Entry point of the matching engine for route handlers. It
 * rejects a missing description before any extraction happens, passes a
 * dataset failure through unchanged, and otherwise returns the extracted
 * requirements with every profile ranked. Slicing to the top N is left to
 * the caller.
 */

import { logger } from '../config/logger';
import { success, failure, isFailure, type Result } from '../../shared/result-types';
import {
  MissingDescriptionError,
  type ProfileDatasetUnavailableError,
} from '../../shared/errors';
import { summarizeRequirements, type MatchOutcome } from '../../shared/schema';
import { extractRequirements } from '../lib/requirement-extractor';
import { rankProfiles } from '../lib/ranking-aggregator';
import type { ProfileDatasetResult } from './profile-dataset';

export type MatchResult = Result<MatchOutcome, MissingDescriptionError | ProfileDatasetUnavailableError>;

export function hasDescription(description: string | null | undefined): description is string {
  return typeof description === 'string' && description.trim().length > 0;
}

export function matchCandidates(
  description: string | null | undefined,
  dataset: ProfileDatasetResult,
): MatchResult {
  if (!hasDescription(description)) {
    return failure(MissingDescriptionError.create());
  }

  if (isFailure(dataset)) {
    return dataset;
  }

  const requirements = extractRequirements(description);
  logger.debug(
    { requirements: summarizeRequirements(requirements), profiles: dataset.data.length },
    'Ranking profiles against extracted requirements',
  );

  return success({
    requirements,
    results: rankProfiles(dataset.data, requirements),
  });
}
