/**
 * Requirement Extractor
 *
 * Turns free-text job descriptions into a RequirementSet by keyword matching
 * over the fixed vocabulary. Matching is by substring on normalized text, so
 * false positives such as "sql" inside "postgresql" are expected.
 */

import { FrozenSet, type RequirementSet } from "../../shared/schema";
import {
  EDUCATION_SCALE,
  NO_EDUCATION,
  SKILL_CATALOG,
  type EducationLevel,
} from "./matching-vocabulary";
import { normalizeText } from "./text-normalizer";

// Integer ending on a word boundary, optional "+", then the word ano/anos
const EXPERIENCE_PATTERN = /\b(\d+)\b\s*\+?\s*anos?\b/;

export function extractSkills(normalizedText: string): FrozenSet<string> {
  return new FrozenSet(SKILL_CATALOG.filter((skill) => normalizedText.includes(skill)));
}

export function extractExperienceYears(normalizedText: string): number {
  const match = EXPERIENCE_PATTERN.exec(normalizedText);
  if (!match) return 0;

  const years = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(years) ? years : 0;
}

/**
 * Highest-ranked education label present in the text, regardless of where it
 * appears or how long the other matches are.
 */
export function extractEducation(normalizedText: string): EducationLevel {
  let best = NO_EDUCATION;
  for (const level of EDUCATION_SCALE) {
    if (level.rank > best.rank && normalizedText.includes(level.label)) {
      best = level;
    }
  }
  return best;
}

export function extractRequirements(description: string | null | undefined): RequirementSet {
  const text = normalizeText(description);

  return Object.freeze({
    skills: extractSkills(text),
    experienceYears: extractExperienceYears(text),
    education: extractEducation(text).label,
  });
}
