/**
 * Tests for the frequency-based Sandhi splitter.
 * The shared cases in data/test_cases.json are checked against data/telugu_vocab.txt.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { SandhiSplitter, selectBestSplit } from '../src/splitter';
import { scoreSplit } from '../src/scoring';
import { Vocabulary } from '../src/vocabulary';

interface TestCase {
    id: number;
    input: string;
    description: string;
    expected: string[];
}

describe('selectBestSplit', () => {
    it('should prefer a split with both parts attested', () => {
        const vocabulary = new Map([['చెట్టు', 50], ['ఎక్కువ', 10], ['ఉవ', 900]]);
        // ('చెట్టు', 'ఎక్కువ') scores 1010; ('చెట్టెక్కు', 'ఉవ') only 1000
        expect(selectBestSplit('చెట్టెక్కువ', vocabulary)).toEqual(['చెట్టు', 'ఎక్కువ']);
    });

    it('should pick the most frequent part when only one side is attested', () => {
        const vocabulary = new Map([['ఎట్టెక్కువ', 5], ['ఉవ', 7]]);
        expect(selectBestSplit('చెట్టెక్కువ', vocabulary)).toEqual(['చెట్టెక్కు', 'ఉవ']);
    });

    it('should keep the first candidate on a tie', () => {
        const vocabulary = new Map([['చెట్టు', 50], ['చెట్టి', 50], ['ఎక్కువ', 10]]);
        expect(selectBestSplit('చెట్టెక్కువ', vocabulary)).toEqual(['చెట్టు', 'ఎక్కువ']);
    });

    it('should break ties across rules by rule order', () => {
        // yanadesa ('విది', 'ఆలయము') and utva-ikara ('విద్యు', 'ఆలయము') both score 120
        const vocabulary = new Map([['ఆలయము', 20]]);
        expect(selectBestSplit('విద్యాలయము', vocabulary)).toEqual(['విది', 'ఆలయము']);
    });

    it('should return the word unchanged when nothing triggers', () => {
        const vocabulary = new Map([['క', 3]]);
        expect(selectBestSplit('క', vocabulary)).toEqual(['క']);
        expect(selectBestSplit('', vocabulary)).toEqual(['']);
        expect(selectBestSplit('hello', vocabulary)).toEqual(['hello']);
    });

    it('should return the word unchanged when no candidate scores', () => {
        expect(selectBestSplit('మచ్చ', new Map())).toEqual(['మచ్చ']);
        expect(selectBestSplit('అరటిఅరటి', new Map([['అరటిపండు', 4]]))).toEqual(['అరటిఅరటి']);
    });

    it('should not expect the parts to concatenate back to the word', () => {
        const vocabulary = new Map([['అతి', 30], ['అంత', 40]]);
        const parts = selectBestSplit('అత్యంత', vocabulary);
        expect(parts).toEqual(['అతి', 'అంత']);
        expect(parts.join('')).not.toBe('అత్యంత');
    });

    it('should always return one or two parts', () => {
        const vocabulary = new Map([['అతి', 30], ['ఆ', 1], ['చ', 2]]);
        const inputs = ['', ' ', 'a', '్', 'ా', '్్్', 'క్', 'అక్క', 'మచ్చ', 'ఆఆఆఆ', '\u200C', 'అత్యంత'];
        for (const input of inputs) {
            const parts = selectBestSplit(input, vocabulary);
            expect(parts.length === 1 || parts.length === 2).toBe(true);
        }
    });
});

describe('scoreSplit', () => {
    const vocabulary = new Map([['చెట్టు', 50], ['ఎక్కువ', 10]]);

    it('should score the tiers', () => {
        expect(scoreSplit(['చెట్టు', 'ఎక్కువ'], vocabulary)).toBe(1010);
        expect(scoreSplit(['చెట్టు', 'ఉవ'], vocabulary)).toBe(150);
        expect(scoreSplit(['ఉవ', 'ఎక్కువ'], vocabulary)).toBe(110);
        expect(scoreSplit(['ఉవ', 'ఉవ'], vocabulary)).toBe(0);
    });
});

describe('SandhiSplitter', () => {
    it('should rank every scoring candidate, best first', () => {
        const splitter = new SandhiSplitter(new Map([['ఆలయము', 20], ['విద్య', 80]]));
        expect(splitter.rankCandidates('విద్యాలయము')).toEqual([
            { rule: 'savarnadeergha', parts: ['విద్య', 'అలయము'], score: 180 },
            { rule: 'yanadesa', parts: ['విది', 'ఆలయము'], score: 120 },
            { rule: 'utva-ikara', parts: ['విద్యు', 'ఆలయము'], score: 120 },
            { rule: 'utva-ikara', parts: ['విద్యి', 'ఆలయము'], score: 120 },
        ]);
    });

    it('should rank a both-sides match above earlier one-sided ones', () => {
        const splitter = new SandhiSplitter(new Map([['మరి', 22], ['ఒక', 90]]));
        const ranked = splitter.rankCandidates('మరియొక');
        expect(ranked[0]).toEqual({ rule: 'yadagama', parts: ['మరి', 'ఒక'], score: 1022 });
        expect(ranked).toHaveLength(4);
    });

    it('should pre-tokenize a line', () => {
        const splitter = new SandhiSplitter(new Map([['అతి', 30], ['అంత', 40], ['మత్', 5]]));
        expect(splitter.preTokenizeLine('  అత్యంత   క\u200Cమచ్చ  ')).toBe('అతి అంత క మత్ చ');
    });

    it('should pre-tokenize an empty line to an empty string', () => {
        const splitter = new SandhiSplitter(new Map());
        expect(splitter.preTokenizeLine('')).toBe('');
        expect(splitter.preTokenizeLine('   \t ')).toBe('');
    });
});

describe('shared test cases', () => {
    let splitter: SandhiSplitter;
    let testCases: TestCase[];

    beforeAll(async () => {
        const dataDir = path.join(__dirname, '..', 'data');
        const vocabulary = await Vocabulary.load(path.join(dataDir, 'telugu_vocab.txt'));
        splitter = new SandhiSplitter(vocabulary);
        testCases = JSON.parse(fs.readFileSync(path.join(dataDir, 'test_cases.json'), 'utf-8'));
    });

    it('should match all expected outputs', () => {
        const failures: string[] = [];

        for (const tc of testCases) {
            const result = splitter.split(tc.input);
            if (JSON.stringify(result) !== JSON.stringify(tc.expected)) {
                failures.push(
                    `[${tc.id}] ${tc.description}\n` +
                    `  Input: ${tc.input}\n` +
                    `  Expected: ${JSON.stringify(tc.expected)}\n` +
                    `  Actual: ${JSON.stringify(result)}`
                );
            }
        }

        if (failures.length > 0) {
            throw new Error(
                `${failures.length}/${testCases.length} test cases failed:\n${failures.join('\n')}`
            );
        }
    });
});
