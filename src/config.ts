import * as path from 'path';

export interface Args {
    vocab: string;
    corpus: string;
    outputDir: string;
    vocabSize: number;
    modelPrefix: string;
    limit: number | null;
    threads: number;
    trainer: string;
    skipTrain: boolean;
}

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export const USAGE = [
    'Usage: telugu-sandhi-train --vocab <file> --corpus <file> [options]',
    'Options:',
    '  --vocab, -v <path>         Vocabulary file ("word count" per line, or JSON)',
    '  --corpus, -c <path>        Corpus file to pre-tokenize',
    '  --output-dir, -o <dir>     Model directory (default: model)',
    '  --vocab-size, -s <n>       Subword vocabulary size (default: 16000)',
    '  --model-prefix, -p <name>  Model file prefix (default: telugu_bpe)',
    '  --limit, -l <n>            Limit number of corpus lines',
    '  --threads, -t <n>          Number of worker threads (0 = auto)',
    '  --trainer <cmd>            SentencePiece trainer executable (default: spm_train)',
    '  --skip-train               Stop after writing the pre-tokenized corpus',
].join('\n');

function parseCount(flag: string, value: string | undefined, min: number): number {
    if (value === undefined || !/^\d+$/.test(value)) {
        throw new UsageError(`${flag} expects a number, got ${value === undefined ? 'nothing' : `"${value}"`}`);
    }
    const parsed = parseInt(value, 10);
    if (parsed < min) {
        throw new UsageError(`${flag} must be at least ${min}`);
    }
    return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
    if (value === undefined || value.startsWith('-')) {
        throw new UsageError(`${flag} expects a value`);
    }
    return value;
}

export function parseArgs(argv: string[]): Args {
    const parsed: Args = {
        vocab: '',
        corpus: '',
        outputDir: 'model',
        vocabSize: 16000,
        modelPrefix: 'telugu_bpe',
        limit: null,
        threads: 0, // 0 = auto (use CPU count)
        trainer: 'spm_train',
        skipTrain: false
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--vocab' || arg === '-v') {
            parsed.vocab = requireValue(arg, argv[++i]);
        } else if (arg === '--corpus' || arg === '-c') {
            parsed.corpus = requireValue(arg, argv[++i]);
        } else if (arg === '--output-dir' || arg === '-o') {
            parsed.outputDir = requireValue(arg, argv[++i]);
        } else if (arg === '--vocab-size' || arg === '-s') {
            parsed.vocabSize = parseCount(arg, argv[++i], 1);
        } else if (arg === '--model-prefix' || arg === '-p') {
            parsed.modelPrefix = requireValue(arg, argv[++i]);
        } else if (arg === '--limit' || arg === '-l') {
            parsed.limit = parseCount(arg, argv[++i], 1);
        } else if (arg === '--threads' || arg === '-t') {
            parsed.threads = parseCount(arg, argv[++i], 0);
        } else if (arg === '--trainer') {
            parsed.trainer = requireValue(arg, argv[++i]);
        } else if (arg === '--skip-train') {
            parsed.skipTrain = true;
        } else {
            throw new UsageError(`Unknown option: ${arg}`);
        }
    }

    if (!parsed.vocab || !parsed.corpus) {
        throw new UsageError('--vocab and --corpus are required');
    }

    return parsed;
}

// The pre-tokenized corpus is written beside the source corpus
export function pretokenizedPath(corpusPath: string): string {
    return path.join(path.dirname(corpusPath), 'corpus.pretokenized.txt');
}

export interface AnalyzeArgs {
    vocab: string | null;
    words: string[];
}

export const ANALYZE_USAGE = [
    'Usage: telugu-sandhi-analyze [--vocab <file>] <word...>',
    'Options:',
    '  --vocab, -v <path>  Vocabulary file; adds the ranked candidates and the selected split',
].join('\n');

export function parseAnalyzeArgs(argv: string[]): AnalyzeArgs {
    const parsed: AnalyzeArgs = { vocab: null, words: [] };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--vocab' || arg === '-v') {
            parsed.vocab = requireValue(arg, argv[++i]);
        } else if (arg.startsWith('-')) {
            throw new UsageError(`Unknown option: ${arg}`);
        } else {
            parsed.words.push(arg);
        }
    }

    if (parsed.words.length === 0) {
        throw new UsageError('at least one word is required');
    }

    return parsed;
}
