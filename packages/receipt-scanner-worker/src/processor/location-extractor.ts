import { isDateShapedLine } from "./date-extractor.js";
import { ADDRESS_DISQUALIFIERS, containsAny, type LocaleProfile } from "./locale-profiles.js";

type AddressCandidate = {
  index: number;
  text: string;
  score: number;
};

const ADDRESS_KEYWORD_SCORE = 5;
const POSTAL_CODE_SCORE = 6;
const LOCALITY_SCORE = 4;
const DISQUALIFIER_PENALTY = -20;
const ADJACENCY_BONUS = 5;

export function scoreAddressLine(line: string, profile: LocaleProfile): number {
  const cleaned = line.trim();
  const upper = cleaned.toUpperCase();

  let score = 0;
  if (containsAny(upper, profile.addressKeywords)) {
    score += ADDRESS_KEYWORD_SCORE;
  }
  if (profile.postalCodePattern.test(cleaned)) {
    score += POSTAL_CODE_SCORE;
  }
  if (profile.localityPattern.test(cleaned)) {
    score += LOCALITY_SCORE;
  }
  if (containsAny(upper, ADDRESS_DISQUALIFIERS)) {
    score += DISQUALIFIER_PENALTY;
  }
  return score;
}

/**
 * Scores address-like lines and joins a candidate with the candidate on the very next line.
 * Merging is pairwise: a third consecutive line starts a new candidate.
 */
export function extractLocation(lines: readonly string[], profile: LocaleProfile): string | null {
  const scored: AddressCandidate[] = [];

  lines.forEach((line, index) => {
    if (isDateShapedLine(line, profile)) {
      return;
    }
    const score = scoreAddressLine(line, profile);
    if (score > 0) {
      scored.push({ index, text: line.trim(), score });
    }
  });

  const merged: AddressCandidate[] = [];
  let cursor = 0;
  while (cursor < scored.length) {
    const current = scored[cursor];
    const next = scored[cursor + 1];
    if (!current) {
      break;
    }

    if (next && next.index === current.index + 1) {
      merged.push({
        index: current.index,
        text: `${current.text} ${next.text}`,
        score: current.score + next.score + ADJACENCY_BONUS,
      });
      cursor += 2;
      continue;
    }

    merged.push(current);
    cursor += 1;
  }

  let best: AddressCandidate | null = null;
  for (const candidate of merged) {
    if (!best || candidate.score > best.score) {
      best = candidate;
    }
  }
  return best ? best.text : null;
}
