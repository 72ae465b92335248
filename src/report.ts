import { RULE_NAMES } from './rules';
import type { SandhiSplits } from './rules';
import type { ScoredCandidate } from './scoring';

/**
 * Renders every rule's candidates for `word`, one `rule: 'p1' + 'p2'` line per pair.
 * When `best` is given, a final `best:` line shows the selected split.
 */
export function formatAnalysis(word: string, splits: SandhiSplits, best?: string[]): string {
    const lines = [word];
    let found = false;

    for (const name of RULE_NAMES) {
        for (const [part1, part2] of splits[name] ?? []) {
            lines.push(`  ${name}: '${part1}' + '${part2}'`);
            found = true;
        }
    }
    if (!found) {
        lines.push('  (no candidates)');
    }
    if (best) {
        lines.push(`  best: ${best.map(part => `'${part}'`).join(' + ')}`);
    }
    return lines.join('\n');
}

// One `score rule: 'p1' + 'p2'` line per scoring candidate, in ranked order
export function formatRanking(ranked: ScoredCandidate[]): string {
    if (ranked.length === 0) return '  ranked: (none in vocabulary)';

    const lines = ['  ranked:'];
    for (const { rule, parts, score } of ranked) {
        lines.push(`    ${score} ${rule}: '${parts[0]}' + '${parts[1]}'`);
    }
    return lines.join('\n');
}
