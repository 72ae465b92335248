// Telugu Unicode block
export const TELUGU_START = 0x0C00;
export const TELUGU_END = 0x0C7F;

export const VIRAMA = '్';
export const VIRAMA_CODE = 0x0C4D;
export const ZWNJ = '\u200C';

export type CodepointClass = 'consonant' | 'independent-vowel' | 'dependent-vowel' | 'virama' | 'other';

const CONSONANTS = 'కఖగఘఙచఛజఝఞటఠడఢణతథదధనపఫబభమయరలవశషసహళఱ';
const INDEPENDENT_VOWELS = 'అఆఇఈఉఊఋౠఎఏఐఒఓఔ';

// Dependent vowel sign -> independent vowel. అ has no sign.
const MATRA_PAIRS: ReadonlyArray<readonly [string, string]> = [
    ['ా', 'ఆ'], ['ి', 'ఇ'], ['ీ', 'ఈ'], ['ు', 'ఉ'], ['ూ', 'ఊ'], ['ృ', 'ఋ'], ['ౄ', 'ౠ'],
    ['ె', 'ఎ'], ['ే', 'ఏ'], ['ై', 'ఐ'], ['ొ', 'ఒ'], ['ో', 'ఓ'], ['ౌ', 'ఔ'],
];

export const DEPENDENT_VOWEL_SIGNS: readonly string[] = MATRA_PAIRS.map(([matra]) => matra);

const MATRA_TO_VOWEL: ReadonlyMap<string, string> = new Map(MATRA_PAIRS);
const VOWEL_TO_MATRA: ReadonlyMap<string, string> = new Map(
    MATRA_PAIRS.map(([matra, vowel]) => [vowel, matra] as const)
);

// Pre-computed class table over the Telugu block, indexed by code - TELUGU_START
const CLASS_TABLE: CodepointClass[] = new Array<CodepointClass>(TELUGU_END - TELUGU_START + 1).fill('other');
for (const c of CONSONANTS) CLASS_TABLE[c.charCodeAt(0) - TELUGU_START] = 'consonant';
for (const c of INDEPENDENT_VOWELS) CLASS_TABLE[c.charCodeAt(0) - TELUGU_START] = 'independent-vowel';
for (const matra of DEPENDENT_VOWEL_SIGNS) CLASS_TABLE[matra.charCodeAt(0) - TELUGU_START] = 'dependent-vowel';
CLASS_TABLE[VIRAMA_CODE - TELUGU_START] = 'virama';

// === CharCode-based functions ===

export function classifyCode(code: number): CodepointClass {
    if (code < TELUGU_START || code > TELUGU_END) return 'other';
    return CLASS_TABLE[code - TELUGU_START];
}

export function isConsonantCode(code: number): boolean {
    return classifyCode(code) === 'consonant';
}

// === String-based functions ===

// Telugu sits in the BMP, so charCodeAt is the codepoint. An empty string classifies as 'other'.
export function classify(c: string): CodepointClass {
    if (!c) return 'other';
    return classifyCode(c.charCodeAt(0));
}

export function isConsonant(c: string): boolean {
    return classify(c) === 'consonant';
}

export function isDependentVowel(c: string): boolean {
    return classify(c) === 'dependent-vowel';
}

export function matraToIndependentVowel(matra: string): string | undefined {
    return MATRA_TO_VOWEL.get(matra);
}

export function independentVowelToMatra(vowel: string): string | undefined {
    return VOWEL_TO_MATRA.get(vowel);
}

/**
 * Finds where the consonant cluster ending just before `endIndex` begins.
 *
 * Scans backward from `endIndex - 1`. A virama keeps the scan going, and so does a consonant
 * that is itself preceded by a virama (a medial conjunct member). The first consonant at index 0
 * or not preceded by a virama is the start. Any other character ends the scan.
 *
 * @returns the start index, or -1 if no cluster precedes `endIndex`
 */
export function findClusterStart(word: string, endIndex: number): number {
    if (endIndex < 1 || endIndex > word.length) return -1;

    for (let j = endIndex - 1; j >= 0; j--) {
        const code = word.charCodeAt(j);
        if (isConsonantCode(code)) {
            if (j === 0 || word.charCodeAt(j - 1) !== VIRAMA_CODE) {
                return j;
            }
        } else if (code !== VIRAMA_CODE) {
            break;
        }
    }
    return -1;
}
