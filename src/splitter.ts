import { ZWNJ } from './constants';
import { findAllSplits, listCandidates, pairKey } from './rules';
import type { SplitCandidate } from './rules';
import { pickBest, scoreSplit } from './scoring';
import type { FrequencyLookup, ScoredCandidate } from './scoring';

const WHITESPACE = /\s+/;

// Drops pairs already emitted by an earlier rule
function uniqueCandidates(word: string): SplitCandidate[] {
    const seen = new Set<string>();
    const unique: SplitCandidate[] = [];
    for (const candidate of listCandidates(findAllSplits(word))) {
        const key = pairKey(candidate.parts);
        if (seen.has(key)) continue;
        seen.add(key);
        unique.push(candidate);
    }
    return unique;
}

/**
 * Returns the best-supported split of `word` as `[part1, part2]`, or `[word]` when no
 * candidate has either part in the vocabulary.
 */
export function selectBestSplit(word: string, vocabulary: FrequencyLookup): string[] {
    const candidates = uniqueCandidates(word);
    if (candidates.length === 0) return [word];

    const best = pickBest(candidates, vocabulary);
    if (!best) return [word];
    return [best.parts[0], best.parts[1]];
}

export class SandhiSplitter {
    vocabulary: FrequencyLookup;

    constructor(vocabulary: FrequencyLookup) {
        this.vocabulary = vocabulary;
    }

    split(word: string): string[] {
        return selectBestSplit(word, this.vocabulary);
    }

    // Positively scored candidates, best first; equal scores keep rule order
    rankCandidates(word: string): ScoredCandidate[] {
        const scored: ScoredCandidate[] = [];
        for (const candidate of uniqueCandidates(word)) {
            const score = scoreSplit(candidate.parts, this.vocabulary);
            if (score > 0) scored.push({ ...candidate, score });
        }
        return scored.sort((a, b) => b.score - a.score);
    }

    preTokenizeLine(line: string): string {
        const trimmed = line.trim();
        if (!trimmed) return '';

        const pieces: string[] = [];
        for (const token of trimmed.split(WHITESPACE)) {
            // ZWNJ marks a visual break inside a token; treat each side as its own word
            for (const subWord of token.split(ZWNJ)) {
                if (!subWord) continue;
                pieces.push(...this.split(subWord));
            }
        }
        return pieces.join(' ');
    }
}
