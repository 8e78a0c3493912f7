import { z } from "zod";

// ===== PROFILE DATASET =====

/**
 * Parses a year count leniently. Integers and integral strings are accepted,
 * fractional numbers are truncated, everything else becomes 0.
 */
export function parseYears(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : 0;
  }
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) {
    const parsed = Number.parseInt(value, 10);
    return Number.isSafeInteger(parsed) ? parsed : 0;
  }
  return 0;
}

const textField = z.string().catch("");

const skillsField = z
  .array(z.unknown())
  .catch([])
  .transform((items) => items.filter((item): item is string => typeof item === "string"));

// A record must be an object; its individual fields fall back to empty values
export const profileSchema = z.object({
  name: textField,
  url: textField,
  skills: skillsField,
  experience_years: z.unknown().transform(parseYears),
  education_level: textField,
});

export const profileDatasetSchema = z.array(profileSchema);

export type Profile = z.infer<typeof profileSchema>;

// ===== ENGINE OUTPUT =====

export interface RequirementSet {
  readonly skills: ReadonlySet<string>;
  readonly experienceYears: number;
  readonly education: string;
}

/**
 * Read-only view over a private Set. The wrapper exposes no mutators and is
 * frozen, so the contents are fixed once constructed.
 */
export class FrozenSet<T> implements ReadonlySet<T> {
  private readonly items: Set<T>;

  constructor(values: Iterable<T> = []) {
    this.items = new Set(values);
    Object.freeze(this);
  }

  get size(): number {
    return this.items.size;
  }

  has(value: T): boolean {
    return this.items.has(value);
  }

  forEach(callbackfn: (value: T, value2: T, set: ReadonlySet<T>) => void, thisArg?: unknown): void {
    for (const value of this.items) {
      callbackfn.call(thisArg, value, value, this);
    }
  }

  entries() {
    return this.items.entries();
  }

  keys() {
    return this.items.keys();
  }

  values() {
    return this.items.values();
  }

  [Symbol.iterator]() {
    return this.items[Symbol.iterator]();
  }
}

export interface ScoreResult {
  name: string;
  url: string;
  score: number;
  justification: string;
}

export interface MatchOutcome {
  requirements: RequirementSet;
  results: ScoreResult[];
}

// JSON-friendly view of a RequirementSet, skills sorted
export interface RequirementSummary {
  skills: string[];
  experienceYears: number;
  education: string;
}

export function summarizeRequirements(requirements: RequirementSet): RequirementSummary {
  return {
    skills: [...requirements.skills].sort(),
    experienceYears: requirements.experienceYears,
    education: requirements.education,
  };
}

// ===== API RESPONSES =====

export interface MatchResponseData {
  total: number;
  returned: number;
  results: ScoreResult[];
  requirements?: RequirementSummary;
}
