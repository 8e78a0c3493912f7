/**
 * Candidate Matching Routes
 * Ranks the profile dataset against a job description
 */

import { Router, Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";
import { failure } from "../../shared/result-types";
import { MissingDescriptionError } from "../../shared/errors";
import { summarizeRequirements, type MatchResponseData } from "../../shared/schema";
import { matchCandidates } from "../services/matching-service";
import type { ProfileSource } from "../services/profile-dataset";
import { extractRequirements } from "../lib/requirement-extractor";
import { handleRouteResult, sendSuccess } from "../lib/route-error-handler";
import {
  DESCRIPTION_FIELDS,
  readDescription,
  readMatchParams,
  type LimitSettings,
} from "../middleware/match-params";

export interface MatchingRouterDeps {
  profileSource: ProfileSource;
  limits: LimitSettings;
}

// Answered before the dataset is loaded
function rejectMissingDescription(res: Response): void {
  handleRouteResult(failure(MissingDescriptionError.create([...DESCRIPTION_FIELDS])), res, () => {}, {
    includeErrorDetails: true,
  });
}

export function createMatchingRouter({ profileSource, limits }: MatchingRouterDeps): Router {
  const router = Router();

  const handleMatch = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = readMatchParams(req, limits);
      if (params.description === undefined) {
        rejectMissingDescription(res);
        return;
      }

      const dataset = await profileSource.load();
      const result = matchCandidates(params.description, dataset);

      handleRouteResult(result, res, ({ requirements, results }) => {
        const top = results.slice(0, params.limit);
        const data: MatchResponseData = {
          total: results.length,
          returned: top.length,
          results: top,
        };
        if (params.debug) {
          data.requirements = summarizeRequirements(requirements);
        }

        logger.info(
          { source: profileSource.description, total: data.total, returned: data.returned },
          "Profiles ranked",
        );
        sendSuccess(res, data);
      });
    } catch (error) {
      next(error);
    }
  };

  // Body fields take precedence over the query string
  router.post("/match", handleMatch);
  router.get("/match", handleMatch);

  // Inspection mode: the parsed requirements alone
  router.get("/requirements", (req: Request, res: Response) => {
    const description = readDescription(req);
    if (description === undefined) {
      rejectMissingDescription(res);
      return;
    }

    sendSuccess(res, summarizeRequirements(extractRequirements(description)));
  });

  return router;
}
