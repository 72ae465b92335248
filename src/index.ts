#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { performance } from 'perf_hooks';
import { USAGE, UsageError, parseArgs, pretokenizedPath } from './config';
import type { Args } from './config';
import {
    preTokenizeLines, preTokenizeParallel, readCorpusLines, shouldRunParallel, writeLines
} from './pipeline';
import { SandhiSplitter } from './splitter';
import { SentencePieceTrainer } from './trainer';
import type { SubwordTrainer } from './trainer';
import { Vocabulary } from './vocabulary';

async function main() {
    let args: Args;
    try {
        args = parseArgs(process.argv.slice(2));
    } catch (err) {
        if (err instanceof UsageError) {
            console.error(`Error: ${err.message}`);
            console.error(USAGE);
            process.exit(1);
        }
        throw err;
    }

    console.log('Initializing Sandhi pre-tokenizer...');
    console.log(`Vocabulary: ${args.vocab}`);
    console.log(`Corpus: ${args.corpus}`);

    const startLoad = performance.now();
    const vocabulary = await Vocabulary.load(args.vocab);
    const loadTime = (performance.now() - startLoad) / 1000;
    console.log(`Loaded ${vocabulary.size} words in ${loadTime.toFixed(2)}s`);

    const lines = await readCorpusLines(args.corpus, args.limit);
    console.log(`Pre-tokenizing ${lines.length} lines...`);
    const startProcess = performance.now();

    let results: string[];
    if (shouldRunParallel(lines.length, args.threads)) {
        results = await preTokenizeParallel({ vocabPath: args.vocab, threads: args.threads }, lines);
    } else {
        console.log('Running single-threaded...');
        results = preTokenizeLines(new SandhiSplitter(vocabulary), lines);
    }

    const outputPath = pretokenizedPath(args.corpus);
    await writeLines(outputPath, results);

    const duration = (performance.now() - startProcess) / 1000;
    console.log(`Pre-tokenization saved to ${outputPath}`);
    console.log(`Time taken: ${duration.toFixed(2)}s`);
    if (duration > 0) {
        console.log(`Speed: ${(lines.length / duration).toFixed(2)} lines/sec`);
    }

    if (args.skipTrain) return;

    await fs.promises.mkdir(args.outputDir, { recursive: true });
    const modelPrefix = path.join(args.outputDir, args.modelPrefix);

    console.log(`Training BPE model (vocab size: ${args.vocabSize})...`);
    const trainer: SubwordTrainer = new SentencePieceTrainer({ binary: args.trainer });
    const modelFile = await trainer.train({
        inputFile: outputPath,
        modelPrefix,
        vocabSize: args.vocabSize
    });
    console.log(`Model saved as ${modelFile}`);
}

main().catch(err => {
    console.error(err);
    process.exit(1);
});
