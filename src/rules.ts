import {
    VIRAMA, findClusterStart, isConsonant, isDependentVowel,
    matraToIndependentVowel
} from './constants';

export type SplitPair = readonly [string, string];

export type SandhiRule = (word: string) => SplitPair[];

// Fixed rule order; also the tie-break order used when scoring
export const RULE_NAMES = [
    'savarnadeergha',
    'guna',
    'vriddhi',
    'yanadesa',
    'utva-ikara',
    'yadagama',
    'gasada-dava',
    'amredita',
    'trika',
    'jashtva',
    'schutva',
    'anunasika',
] as const;

export type RuleName = typeof RULE_NAMES[number];

export type SandhiSplits = Partial<Record<RuleName, SplitPair[]>>;

export interface SplitCandidate {
    rule: RuleName;
    parts: SplitPair;
}

const INHERENT_A = 'అ';

// Long sign -> [short independent vowel, short sign]
const SAVARNADEERGHA_MAP: ReadonlyMap<string, readonly [string, string]> = new Map([
    ['ా', ['అ', ''] as const],
    ['ీ', ['ఇ', 'ి'] as const],
    ['ూ', ['ఉ', 'ు'] as const],
    ['ౄ', ['ఋ', 'ృ'] as const],
]);

const GUNA_MAP: ReadonlyMap<string, readonly [string, string]> = new Map([
    ['ే', ['ఇ', 'ఈ'] as const],
    ['ో', ['ఉ', 'ఊ'] as const],
]);

const VRIDDHI_MAP: ReadonlyMap<string, readonly [string, string]> = new Map([
    ['ై', ['ఏ', 'ఐ'] as const],
    ['ౌ', ['ఓ', 'ఔ'] as const],
]);

// Semivowel after a virama -> the sign it replaced
const YANADESA_MAP: ReadonlyMap<string, string> = new Map([
    ['య', 'ి'],
    ['వ', 'ు'],
    ['ర', 'ృ'],
]);

const ELIDED_MATRAS: readonly string[] = ['ు', 'ి'];

const GASADADAVA_MAP: ReadonlyMap<string, string> = new Map([
    ['గ', 'క'], ['స', 'చ'], ['డ', 'ట'], ['ద', 'త'], ['వ', 'ప'],
]);

const TRIKA_MAP: ReadonlyMap<string, string> = new Map([
    ['అ', 'ఆ'], ['ఇ', 'ఈ'], ['ఎ', 'ఏ'],
]);

const JASHTVA_MAP: ReadonlyMap<string, string> = new Map([
    ['గ', 'క'], ['జ', 'చ'], ['డ', 'ట'], ['ద', 'త'], ['బ', 'ప'],
]);

const ANUNASIKA_MAP: ReadonlyMap<string, string> = new Map([
    ['ఙ', 'క'], ['ఞ', 'చ'], ['ణ', 'ట'], ['న', 'త'], ['మ', 'ప'],
]);

// Geminate -> replacement for its first half
const SCHUTVA_GEMINATES: ReadonlyArray<readonly [string, string]> = [
    ['చ్చ', 'త్'],
    ['శ్శ', 'స్'],
];

const NA_GEMINATE = 'న్న';

// Keeps the first occurrence of each pair
function dedupe(pairs: SplitPair[]): SplitPair[] {
    const seen = new Set<string>();
    const unique: SplitPair[] = [];
    for (const pair of pairs) {
        const key = pairKey(pair);
        if (seen.has(key)) continue;
        seen.add(key);
        unique.push(pair);
    }
    return unique;
}

export function pairKey([part1, part2]: SplitPair): string {
    return part1 + '\u0000' + part2;
}

// Vowel carried by the sign at `index` (inherent అ if there is none), and where the rest begins
function vowelAt(word: string, index: number): [string, number] {
    const vowel = matraToIndependentVowel(word.charAt(index));
    return vowel !== undefined ? [vowel, index + 1] : [INHERENT_A, index];
}

export function splitSavarnadeergha(word: string): SplitPair[] {
    const splits: SplitPair[] = [];
    for (let i = 0; i < word.length; i++) {
        const entry = SAVARNADEERGHA_MAP.get(word[i]);
        if (!entry || findClusterStart(word, i) === -1) continue;

        const [shortVowel, shortMatra] = entry;
        splits.push([word.slice(0, i) + shortMatra, shortVowel + word.slice(i + 1)]);
    }
    return dedupe(splits);
}

function splitVowelPair(word: string, table: ReadonlyMap<string, readonly [string, string]>): SplitPair[] {
    const splits: SplitPair[] = [];
    for (let i = 0; i < word.length; i++) {
        const vowels = table.get(word[i]);
        if (!vowels || findClusterStart(word, i) === -1) continue;

        const part1 = word.slice(0, i);
        const suffix = word.slice(i + 1);
        splits.push([part1, vowels[0] + suffix]);
        splits.push([part1, vowels[1] + suffix]);
    }
    return dedupe(splits);
}

export function splitGuna(word: string): SplitPair[] {
    return splitVowelPair(word, GUNA_MAP);
}

export function splitVriddhi(word: string): SplitPair[] {
    return splitVowelPair(word, VRIDDHI_MAP);
}

export function splitYanadesa(word: string): SplitPair[] {
    const splits: SplitPair[] = [];
    for (let i = 1; i + 1 < word.length; i++) {
        if (word[i] !== VIRAMA || !isConsonant(word[i - 1])) continue;

        const restoredMatra = YANADESA_MAP.get(word[i + 1]);
        if (restoredMatra === undefined) continue;

        const [vowel, restStart] = vowelAt(word, i + 2);
        splits.push([word.slice(0, i) + restoredMatra, vowel + word.slice(restStart)]);
    }
    return dedupe(splits);
}

export function splitUtvaIkara(word: string): SplitPair[] {
    const splits: SplitPair[] = [];
    for (let i = 1; i < word.length; i++) {
        const vowel = matraToIndependentVowel(word[i]);
        if (vowel === undefined || findClusterStart(word, i) === -1) continue;

        const head = word.slice(0, i);
        const part2 = vowel + word.slice(i + 1);
        for (const elided of ELIDED_MATRAS) {
            splits.push([head + elided, part2]);
        }
    }
    return dedupe(splits);
}

export function splitYadagama(word: string): SplitPair[] {
    const splits: SplitPair[] = [];
    for (let i = 2; i + 1 < word.length; i++) {
        if (word[i] !== 'య' || word[i - 1] !== 'ి' || !isConsonant(word[i - 2])) continue;

        const next = word[i + 1];
        const part1 = word.slice(0, i);
        if (isConsonant(next)) {
            splits.push([part1, INHERENT_A + word.slice(i + 1)]);
        } else if (isDependentVowel(next)) {
            const [vowel, restStart] = vowelAt(word, i + 1);
            splits.push([part1, vowel + word.slice(restStart)]);
        }
    }
    return dedupe(splits);
}

export function splitGasadaDava(word: string): SplitPair[] {
    const splits: SplitPair[] = [];
    for (let i = 0; i < word.length; i++) {
        const voiceless = GASADADAVA_MAP.get(word[i]);
        if (voiceless === undefined) continue;

        const start = findClusterStart(word, i);
        // Part1 must keep at least two characters
        if (start < 2) continue;

        splits.push([word.slice(0, start), voiceless + word.slice(start + 1)]);
    }
    return dedupe(splits);
}

export function splitAmredita(word: string): SplitPair[] {
    const n = word.length;
    if (n < 2 || n % 2 !== 0) return [];

    const mid = n / 2;
    const first = word.slice(0, mid);
    const second = word.slice(mid);
    return first === second ? [[first, second]] : [];
}

export function splitTrika(word: string): SplitPair[] {
    if (word.length <= 3) return [];

    const lengthened = TRIKA_MAP.get(word[0]);
    if (lengthened === undefined) return [];
    if (!isConsonant(word[1]) || word[2] !== VIRAMA || word[1] !== word[3]) return [];

    return [[lengthened, word.slice(3)]];
}

export function splitJashtva(word: string): SplitPair[] {
    const splits: SplitPair[] = [];
    for (let i = 0; i < word.length; i++) {
        const voiceless = JASHTVA_MAP.get(word[i]);
        if (voiceless === undefined) continue;

        const [vowel, restStart] = vowelAt(word, i + 1);
        splits.push([word.slice(0, i) + voiceless + VIRAMA, vowel + word.slice(restStart)]);
    }
    return dedupe(splits);
}

export function splitSchutva(word: string): SplitPair[] {
    const splits: SplitPair[] = [];
    for (const [geminate, replacement] of SCHUTVA_GEMINATES) {
        const index = word.indexOf(geminate);
        if (index === -1) continue;
        // Part2 starts at the geminate's second letter
        splits.push([word.slice(0, index) + replacement, word.slice(index + 2)]);
    }
    return dedupe(splits);
}

export function splitAnunasika(word: string): SplitPair[] {
    const splits: SplitPair[] = [];
    for (let i = 1; i + 1 < word.length; i++) {
        if (word[i] !== VIRAMA || !isConsonant(word[i + 1])) continue;

        const stop = ANUNASIKA_MAP.get(word[i - 1]);
        if (stop === undefined) continue;

        splits.push([word.slice(0, i - 1) + stop + VIRAMA, word.slice(i + 1)]);
    }

    const index = word.indexOf(NA_GEMINATE);
    if (index !== -1) {
        splits.push([word.slice(0, index) + 'త' + VIRAMA, word.slice(index + 2)]);
    }
    return dedupe(splits);
}

export const SANDHI_RULES: Readonly<Record<RuleName, SandhiRule>> = {
    'savarnadeergha': splitSavarnadeergha,
    'guna': splitGuna,
    'vriddhi': splitVriddhi,
    'yanadesa': splitYanadesa,
    'utva-ikara': splitUtvaIkara,
    'yadagama': splitYadagama,
    'gasada-dava': splitGasadaDava,
    'amredita': splitAmredita,
    'trika': splitTrika,
    'jashtva': splitJashtva,
    'schutva': splitSchutva,
    'anunasika': splitAnunasika,
};

/**
 * Runs every Sandhi rule over `word`.
 *
 * Keys follow {@link RULE_NAMES} order; rules with no candidates are left out.
 */
export function findAllSplits(word: string): SandhiSplits {
    const result: SandhiSplits = {};
    for (const name of RULE_NAMES) {
        const pairs = SANDHI_RULES[name](word);
        if (pairs.length > 0) {
            result[name] = pairs;
        }
    }
    return result;
}

/** Flattens {@link findAllSplits} into candidates, in rule order then emission order. */
export function listCandidates(splits: SandhiSplits): SplitCandidate[] {
    const candidates: SplitCandidate[] = [];
    for (const name of RULE_NAMES) {
        for (const parts of splits[name] ?? []) {
            candidates.push({ rule: name, parts });
        }
    }
    return candidates;
}
