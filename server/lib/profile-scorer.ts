/**
 * Profile Scorer
 *
 * Scores one profile against a RequirementSet. Skills add one point per
 * required skill the profile lists; experience and education add at most one
 * point each, and only when the description states them. The justification
 * lists one clause per dimension in that order.
 */

import type { Profile, RequirementSet } from "../../shared/schema";
import { educationRank } from "./matching-vocabulary";
import { normalizeText } from "./text-normalizer";

export interface ProfileScore {
  score: number;
  justification: string;
}

interface DimensionScore {
  points: number;
  clause: string;
}

function scoreSkills(profile: Profile, requirements: RequirementSet): DimensionScore {
  const profileSkills = new Set(profile.skills.map((skill) => normalizeText(skill)));
  const compatible = [...requirements.skills]
    .filter((skill) => profileSkills.has(skill))
    .sort();

  if (compatible.length > 0) {
    return {
      points: compatible.length,
      clause: `Compatible skills: ${compatible.join(", ")}.`,
    };
  }

  return {
    points: 0,
    clause: requirements.skills.size > 0 ? "No compatible skill." : "No skill was required.",
  };
}

function scoreExperience(profile: Profile, requirements: RequirementSet): DimensionScore {
  const required = requirements.experienceYears;
  const actual = profile.experience_years;

  if (required <= 0) {
    return {
      points: 0,
      clause: `Experience was not an explicit requirement (profile has ${actual} years).`,
    };
  }

  const meets = actual >= required;
  return {
    points: meets ? 1 : 0,
    clause: `Experience: ${actual} years (required: ${required}) - ${meets ? "meets" : "below"} requirement.`,
  };
}

function scoreEducation(profile: Profile, requirements: RequirementSet): DimensionScore {
  const requiredRank = educationRank(requirements.education);
  const label = normalizeText(profile.education_level);
  const shown = label || "not informed";

  if (requiredRank <= 0) {
    return {
      points: 0,
      clause: `Education was not an explicit requirement (profile: ${shown}).`,
    };
  }

  const meets = educationRank(label) >= requiredRank;
  return {
    points: meets ? 1 : 0,
    clause: `Education: ${shown} (required: ${requirements.education}) - ${meets ? "meets" : "below"} requirement.`,
  };
}

export function scoreProfile(profile: Profile, requirements: RequirementSet): ProfileScore {
  const dimensions = [
    scoreSkills(profile, requirements),
    scoreExperience(profile, requirements),
    scoreEducation(profile, requirements),
  ];

  return {
    score: dimensions.reduce((total, dimension) => total + dimension.points, 0),
    justification: dimensions.map((dimension) => dimension.clause).join(" "),
  };
}
