/**
 * Matching Vocabulary
 *
 * Process-wide tables used by requirement extraction and scoring. Entries are
 * stored already normalized (lowercase, accents folded) and the tables are
 * frozen at module load.
 */

export interface EducationLevel {
  readonly label: string;
  readonly rank: number;
}

/**
 * Recognized skills. A skill is required when its token occurs anywhere in
 * the normalized description, so "sql" also matches inside "postgresql".
 */
export const SKILL_CATALOG: readonly string[] = Object.freeze([
  "python",
  "java",
  "javascript",
  "typescript",
  "react",
  "angular",
  "vue",
  "node",
  "django",
  "flask",
  "spring",
  "php",
  "ruby",
  "kotlin",
  "swift",
  "flutter",
  "c#",
  "c++",
  "html",
  "css",
  "sql",
  "mysql",
  "postgresql",
  "mongodb",
  "docker",
  "kubernetes",
  "aws",
  "azure",
  "linux",
  "git",
  "scrum",
  "figma",
  "power bi",
  "machine learning",
  "full stack",
  "front end",
  "back end",
]);

/**
 * Education labels ordered by rank, locale variants sharing the rank of their
 * canonical spelling. On equal rank the earlier label wins.
 */
export const EDUCATION_SCALE: readonly EducationLevel[] = Object.freeze(
  [
    { label: "nenhum", rank: 0 },
    { label: "ensino fundamental", rank: 1 },
    { label: "primeiro grau", rank: 1 },
    { label: "ensino medio", rank: 2 },
    { label: "segundo grau", rank: 2 },
    { label: "tecnico", rank: 3 },
    { label: "superior incompleto", rank: 3 },
    { label: "superior completo", rank: 4 },
    { label: "ensino superior", rank: 4 },
    { label: "graduacao", rank: 4 },
    { label: "bacharelado", rank: 4 },
    { label: "licenciatura", rank: 4 },
    { label: "pos-graduacao", rank: 5 },
    { label: "pos graduacao", rank: 5 },
    { label: "especializacao", rank: 5 },
    { label: "mestrado", rank: 5 },
    { label: "doutorado", rank: 6 },
  ].map((level) => Object.freeze(level)),
);

export const NO_EDUCATION: EducationLevel = EDUCATION_SCALE[0];

const EDUCATION_RANKS: ReadonlyMap<string, number> = new Map(
  EDUCATION_SCALE.map(({ label, rank }) => [label, rank]),
);

/**
 * Rank of a normalized education label; unknown labels rank 0.
 */
export function educationRank(normalizedLabel: string): number {
  return EDUCATION_RANKS.get(normalizedLabel) ?? NO_EDUCATION.rank;
}
