import type { SplitCandidate, SplitPair } from './rules';

// Minimal read-only view of a vocabulary; Map<string, number> satisfies it
export interface FrequencyLookup {
    get(word: string): number | undefined;
}

export interface ScoredCandidate extends SplitCandidate {
    score: number;
}

export const BOTH_PARTS_BONUS = 1000;
export const ONE_PART_BONUS = 100;

/**
 * Scores a split against the vocabulary.
 *
 * Both parts attested: 1000 + the smaller frequency. One part attested: 100 + its frequency.
 * Neither: 0, and the candidate is dropped.
 */
export function scoreSplit([part1, part2]: SplitPair, vocabulary: FrequencyLookup): number {
    const freq1 = vocabulary.get(part1);
    const freq2 = vocabulary.get(part2);

    if (freq1 !== undefined && freq2 !== undefined) {
        return BOTH_PARTS_BONUS + Math.min(freq1, freq2);
    }
    if (freq1 !== undefined) return ONE_PART_BONUS + freq1;
    if (freq2 !== undefined) return ONE_PART_BONUS + freq2;
    return 0;
}

/**
 * Picks the highest-scoring candidate. Only a strictly higher score replaces the current best,
 * so ties go to the candidate met first.
 */
export function pickBest(candidates: SplitCandidate[], vocabulary: FrequencyLookup): ScoredCandidate | null {
    let best: ScoredCandidate | null = null;
    for (const candidate of candidates) {
        const score = scoreSplit(candidate.parts, vocabulary);
        if (score <= 0) continue;
        if (best === null || score > best.score) {
            best = { ...candidate, score };
        }
    }
    return best;
}
