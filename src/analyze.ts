#!/usr/bin/env node
import { ANALYZE_USAGE, UsageError, parseAnalyzeArgs } from './config';
import type { AnalyzeArgs } from './config';
import { formatAnalysis, formatRanking } from './report';
import { findAllSplits } from './rules';
import { SandhiSplitter } from './splitter';
import { Vocabulary } from './vocabulary';

async function main() {
    let args: AnalyzeArgs;
    try {
        args = parseAnalyzeArgs(process.argv.slice(2));
    } catch (err) {
        if (err instanceof UsageError) {
            console.error(`Error: ${err.message}`);
            console.error(ANALYZE_USAGE);
            process.exit(1);
        }
        throw err;
    }

    const splitter = args.vocab ? new SandhiSplitter(await Vocabulary.load(args.vocab)) : null;
    for (const word of args.words) {
        if (!splitter) {
            console.log(formatAnalysis(word, findAllSplits(word)));
            continue;
        }
        console.log(formatAnalysis(word, findAllSplits(word), splitter.split(word)));
        console.log(formatRanking(splitter.rankCandidates(word)));
    }
}

main().catch(err => {
    console.error(err);
    process.exit(1);
});
