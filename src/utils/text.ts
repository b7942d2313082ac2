const TURKISH_FOLDS: Record<string, string> = {
  ı: "i",
  ş: "s",
  ğ: "g",
  ü: "u",
  ö: "o",
  ç: "c"
};

export function normalizeKey(value: string): string {
  return normalizeSpacing(value).toLowerCase();
}

export function normalizeSpacing(value: string): string {
  return value.trim().replace(/\s+/g, " ");
}

export function removeWhitespace(value: string): string {
  return value.replace(/\s+/g, "");
}

/**
 * Lower-cases, collapses whitespace and folds Turkish letters and other
 * diacritics to their plain Latin form, so "AMPİSİLİN" and "ampisilin" agree.
 */
export function foldDiacritics(value: string): string {
  const lower = normalizeKey(value);
  let folded = "";
  for (const char of lower) {
    folded += TURKISH_FOLDS[char] ?? char;
  }
  return folded.normalize("NFD").replace(/[\u0300-\u036f]/g, "");
}

/**
 * Similarity ratio in [0, 1] computed from recursively matched longest common
 * blocks: 2 * matched / (a.length + b.length).
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }
  return (2 * countMatchingCharacters(a, b)) / total;
}

function countMatchingCharacters(a: string, b: string): number {
  if (!a.length || !b.length) {
    return 0;
  }
  let bestLength = 0;
  let bestA = 0;
  let bestB = 0;
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i += 1) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j += 1) {
      if (a[i - 1] === b[j - 1]) {
        current[j] = previous[j - 1] + 1;
        if (current[j] > bestLength) {
          bestLength = current[j];
          bestA = i - bestLength;
          bestB = j - bestLength;
        }
      }
    }
    previous = current;
  }
  if (bestLength === 0) {
    return 0;
  }
  return (
    bestLength +
    countMatchingCharacters(a.slice(0, bestA), b.slice(0, bestB)) +
    countMatchingCharacters(a.slice(bestA + bestLength), b.slice(bestB + bestLength))
  );
}
