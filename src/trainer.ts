import { spawn } from 'child_process';

export interface TrainOptions {
    inputFile: string;
    modelPrefix: string;
    vocabSize: number;
}

export interface SubwordTrainer {
    // Resolves with the path of the trained model file
    train(options: TrainOptions): Promise<string>;
}

export interface SentencePieceOptions {
    binary: string;
    modelType: 'bpe' | 'unigram' | 'char' | 'word';
    characterCoverage: number;
}

export const DEFAULT_SENTENCEPIECE_OPTIONS: SentencePieceOptions = {
    binary: 'spm_train',
    modelType: 'bpe',
    characterCoverage: 1.0
};

export function buildTrainerArgs(options: TrainOptions, settings: SentencePieceOptions): string[] {
    return [
        `--input=${options.inputFile}`,
        `--model_prefix=${options.modelPrefix}`,
        `--vocab_size=${options.vocabSize}`,
        `--model_type=${settings.modelType}`,
        `--character_coverage=${formatCoverage(settings.characterCoverage)}`
    ];
}

// 1 -> "1.0", 0.9995 -> "0.9995"
function formatCoverage(value: number): string {
    return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/** Trains a SentencePiece model by running the `spm_train` executable. */
export class SentencePieceTrainer implements SubwordTrainer {
    settings: SentencePieceOptions;

    constructor(settings: Partial<SentencePieceOptions> = {}) {
        this.settings = { ...DEFAULT_SENTENCEPIECE_OPTIONS, ...settings };
    }

    train(options: TrainOptions): Promise<string> {
        const { binary } = this.settings;
        const args = buildTrainerArgs(options, this.settings);

        return new Promise<string>((resolve, reject) => {
            const child = spawn(binary, args, { stdio: 'inherit' });

            child.on('error', (err) => {
                reject(new Error(`Failed to start ${binary}: ${err.message}`));
            });
            child.on('exit', (code) => {
                if (code === 0) {
                    resolve(`${options.modelPrefix}.model`);
                } else {
                    reject(new Error(`${binary} exited with code ${code}`));
                }
            });
        });
    }
}
