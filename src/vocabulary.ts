import * as fs from 'fs';
import * as readline from 'readline';
import type { FrequencyLookup } from './scoring';

// ASCII or Telugu (U+0C66..U+0C6F) decimal digits
const DIGITS = /^[0-9\u0C66-\u0C6F]+$/;
const TELUGU_ZERO = 0x0C66;
const WHITESPACE = /\s+/;

// Every present word counts at least once
const MIN_FREQUENCY = 1;

function parseDigits(digits: string): number {
    let value = 0;
    for (let i = 0; i < digits.length; i++) {
        const code = digits.charCodeAt(i);
        value = value * 10 + (code >= TELUGU_ZERO ? code - TELUGU_ZERO : code - 0x30);
    }
    return value;
}

function isFrequencyRecord(value: unknown): value is Record<string, number> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
    return Object.values(value).every(v => typeof v === 'number' && Number.isFinite(v));
}

export class Vocabulary implements FrequencyLookup {
    words: Map<string, number>; // Maps word -> frequency

    constructor(entries?: Iterable<readonly [string, number]>) {
        this.words = new Map();
        if (entries) {
            for (const [word, freq] of entries) {
                this.add(word, freq);
            }
        }
    }

    static async load(filePath: string): Promise<Vocabulary> {
        const vocabulary = new Vocabulary();
        await vocabulary.load(filePath);
        return vocabulary;
    }

    async load(filePath: string): Promise<void> {
        if (!fs.existsSync(filePath)) {
            throw new Error(`Vocabulary file not found: ${filePath}`);
        }

        if (filePath.endsWith('.json')) {
            await this.loadJson(filePath);
        } else {
            await this.loadText(filePath);
        }
    }

    // One entry per line: "<word> <count>", or a bare word counted once
    private async loadText(filePath: string): Promise<void> {
        const fileStream = fs.createReadStream(filePath, { encoding: 'utf-8' });
        const rl = readline.createInterface({
            input: fileStream,
            crlfDelay: Infinity
        });

        for await (const line of rl) {
            this.addLine(line);
        }
    }

    private async loadJson(filePath: string): Promise<void> {
        const rawData = await fs.promises.readFile(filePath, 'utf-8');
        const data: unknown = JSON.parse(rawData);
        if (!isFrequencyRecord(data)) {
            throw new Error(`Invalid frequency file: ${filePath}`);
        }

        for (const [word, count] of Object.entries(data)) {
            this.add(word, count);
        }
    }

    addLine(line: string): void {
        const trimmed = line.trim();
        if (!trimmed) return;

        const fields = trimmed.split(WHITESPACE);
        if (fields.length < 2) {
            this.add(trimmed, MIN_FREQUENCY);
            return;
        }

        const last = fields[fields.length - 1];
        const word = fields.slice(0, -1).join(' ');
        this.add(word, DIGITS.test(last) ? parseDigits(last) : MIN_FREQUENCY);
    }

    add(word: string, freq: number): void {
        this.words.set(word, Math.max(Math.floor(freq), MIN_FREQUENCY));
    }

    contains(word: string): boolean {
        return this.words.has(word);
    }

    get(word: string): number | undefined {
        return this.words.get(word);
    }

    get size(): number {
        return this.words.size;
    }
}
