import { describe, it, expect } from 'vitest';
import { formatAnalysis, formatRanking } from '../src/report';
import { findAllSplits } from '../src/rules';
import { SandhiSplitter } from '../src/splitter';

describe('formatAnalysis', () => {
    it('should list each rule pair and the selected split', () => {
        expect(formatAnalysis('మచ్చ', findAllSplits('మచ్చ'), ['మత్', 'చ'])).toBe(
            "మచ్చ\n  schutva: 'మత్' + 'చ'\n  best: 'మత్' + 'చ'"
        );
    });

    it('should keep rule order across rules', () => {
        expect(formatAnalysis('అక్కడ', findAllSplits('అక్కడ'))).toBe(
            "అక్కడ\n  trika: 'ఆ' + 'కడ'\n  jashtva: 'అక్కట్' + 'అ'"
        );
    });

    it('should say when there are no candidates', () => {
        expect(formatAnalysis('క', findAllSplits('క'), ['క'])).toBe("క\n  (no candidates)\n  best: 'క'");
    });
});

describe('formatRanking', () => {
    it('should list scoring candidates best first', () => {
        const splitter = new SandhiSplitter(new Map([['ఆలయము', 20], ['విద్య', 80]]));
        expect(formatRanking(splitter.rankCandidates('విద్యాలయము'))).toBe([
            '  ranked:',
            "    180 savarnadeergha: 'విద్య' + 'అలయము'",
            "    120 yanadesa: 'విది' + 'ఆలయము'",
            "    120 utva-ikara: 'విద్యు' + 'ఆలయము'",
            "    120 utva-ikara: 'విద్యి' + 'ఆలయము'",
        ].join('\n'));
    });

    it('should say when nothing scores', () => {
        const splitter = new SandhiSplitter(new Map());
        expect(formatRanking(splitter.rankCandidates('మచ్చ'))).toBe('  ranked: (none in vocabulary)');
    });
});
