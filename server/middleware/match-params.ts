/**
 * Match Request Parameters
 *
 * Reads the description, result limit and debug flag from a request. Each
 * value is looked up in the body (JSON or form) first and in the query string
 * second, so the same endpoint serves POST and GET callers.
 */

import { z } from "zod";
import { Request } from "express";

export const DESCRIPTION_FIELDS = ["description", "descricao", "vaga"] as const;
const LIMIT_FIELDS = ["limit", "top"] as const;

export interface MatchParams {
  description: string | undefined;
  limit: number;
  debug: boolean;
}

export interface LimitSettings {
  defaultTopN: number;
  maxTopN: number;
}

const paramSourceSchema = z.record(z.unknown()).catch({});

const debugFlagSchema = z
  .union([z.boolean(), z.number(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value === 1;
    return ["true", "1", "yes"].includes(value.trim().toLowerCase());
  })
  .catch(false);

function firstString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    return value.find((item): item is string => typeof item === "string");
  }
  return undefined;
}

function requestSources(req: Request): Record<string, unknown>[] {
  return [paramSourceSchema.parse(req.body), paramSourceSchema.parse(req.query)];
}

/**
 * First non-blank description found, checking every field in the body before
 * the query string
 */
export function readDescription(req: Request): string | undefined {
  for (const source of requestSources(req)) {
    for (const field of DESCRIPTION_FIELDS) {
      const value = firstString(source[field]);
      if (value !== undefined && value.trim().length > 0) {
        return value;
      }
    }
  }
  return undefined;
}

// Fractions truncate toward zero; anything below 1 after that is rejected
const limitSchema = z.coerce
  .number()
  .finite()
  .transform((value) => Math.trunc(value))
  .pipe(z.number().int().positive());

/**
 * Positive integer limit from a raw parameter, or undefined when the value
 * does not parse
 */
export function parseLimit(value: unknown): number | undefined {
  const raw = typeof value === "string" || typeof value === "number" ? value : firstString(value);
  const parsed = limitSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

/**
 * First limit that parses, trying limit then top and the body before the
 * query for each, clamped to the maximum. Falls back to the default.
 */
export function resolveLimit(sources: Record<string, unknown>[], settings: LimitSettings): number {
  for (const field of LIMIT_FIELDS) {
    for (const source of sources) {
      const limit = parseLimit(source[field]);
      if (limit !== undefined) {
        return Math.min(limit, settings.maxTopN);
      }
    }
  }
  return settings.defaultTopN;
}

export function readMatchParams(req: Request, settings: LimitSettings): MatchParams {
  const sources = requestSources(req);
  const [body, query] = sources;

  const debugValue = body.debug ?? query.debug;

  return {
    description: readDescription(req),
    limit: resolveLimit(sources, settings),
    debug: debugFlagSchema.parse(Array.isArray(debugValue) ? firstString(debugValue) : debugValue),
  };
}
