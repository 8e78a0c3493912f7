import type { Profile, RequirementSet, ScoreResult } from "../../shared/schema";
import { scoreProfile } from "./profile-scorer";

/**
 * Score every profile and order by score, highest first. Array.prototype.sort
 * is stable, so equal scores keep their input order.
 */
export function rankProfiles(
  profiles: readonly Profile[],
  requirements: RequirementSet,
): ScoreResult[] {
  const results = profiles.map((profile): ScoreResult => {
    const { score, justification } = scoreProfile(profile, requirements);
    return { name: profile.name, url: profile.url, score, justification };
  });

  return results.sort((a, b) => b.score - a.score);
}
