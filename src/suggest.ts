import { DrugRegistry } from "./registry";
import { foldDiacritics, similarityRatio } from "./utils/text";

export interface SuggestDrugOptions {
  /** Maximum number of names to return. Defaults to 10. */
  limit?: number;
  /** Minimum similarity for fuzzy matches, between 0 and 1. Defaults to 0.6. */
  cutoff?: number;
}

const DEFAULT_LIMIT = 10;
const DEFAULT_CUTOFF = 0.6;

interface Candidate {
  name: string;
  rank: number;
  score: number;
}

/**
 * Registered drug names for a partial or misspelled query: prefix matches,
 * then substring matches, then names above the similarity cutoff. Matching
 * ignores case and diacritics.
 */
export function suggestDrugNames(
  registry: DrugRegistry,
  input: string,
  options?: SuggestDrugOptions
): string[] {
  const limit = options?.limit ?? DEFAULT_LIMIT;
  if (limit <= 0) {
    return [];
  }
  const cutoff = options?.cutoff ?? DEFAULT_CUTOFF;
  const query = foldDiacritics(input);
  const names = registry.names();
  if (!query) {
    return names.slice(0, limit);
  }

  const candidates: Candidate[] = [];
  for (const name of names) {
    const folded = foldDiacritics(name);
    const score = similarityRatio(query, folded);
    if (folded.startsWith(query)) {
      candidates.push({ name, rank: 0, score });
    } else if (folded.includes(query)) {
      candidates.push({ name, rank: 1, score });
    } else if (score >= cutoff) {
      candidates.push({ name, rank: 2, score });
    }
  }

  return candidates
    .sort((a, b) => a.rank - b.rank || b.score - a.score || a.name.localeCompare(b.name))
    .slice(0, limit)
    .map((candidate) => candidate.name);
}
