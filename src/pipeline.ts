import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as readline from 'readline';
import { Worker } from 'worker_threads';
import { isWorkerReply } from './messages';
import type { PreTokenizeMessage, WorkerData } from './messages';
import type { SandhiSplitter } from './splitter';

const PROGRESS_INTERVAL = 1000;
// Smaller inputs run single-threaded
export const MIN_PARALLEL_LINES = 100;
const MAX_AUTO_WORKERS = 8;

export interface ParallelOptions {
    vocabPath: string;
    threads: number;
}

export async function readCorpusLines(filePath: string, limit: number | null = null): Promise<string[]> {
    if (!fs.existsSync(filePath)) {
        throw new Error(`Corpus file not found: ${filePath}`);
    }

    const fileStream = fs.createReadStream(filePath, { encoding: 'utf-8' });
    const rl = readline.createInterface({
        input: fileStream,
        crlfDelay: Infinity
    });

    const lines: string[] = [];
    for await (const line of rl) {
        if (limit !== null && lines.length >= limit) break;
        lines.push(line);
    }
    rl.close();
    fileStream.destroy();
    return lines;
}

export function writeLines(filePath: string, lines: string[]): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        const outputStream = fs.createWriteStream(filePath, { encoding: 'utf-8' });
        outputStream.on('error', reject);
        outputStream.on('finish', () => resolve());
        for (const line of lines) {
            outputStream.write(line + '\n');
        }
        outputStream.end();
    });
}

export function resolveWorkerCount(threads: number): number {
    return threads > 0 ? threads : Math.min(os.cpus().length, MAX_AUTO_WORKERS);
}

export function shouldRunParallel(lineCount: number, threads: number): boolean {
    return lineCount >= MIN_PARALLEL_LINES && resolveWorkerCount(threads) > 1;
}

export function preTokenizeLines(splitter: SandhiSplitter, lines: string[]): string[] {
    const results: string[] = new Array(lines.length);
    for (let i = 0; i < lines.length; i++) {
        results[i] = splitter.preTokenizeLine(lines[i]);
        if ((i + 1) % PROGRESS_INTERVAL === 0) {
            console.log(`  ...processed ${i + 1} lines`);
        }
    }
    return results;
}

export interface LineChunk {
    start: number;
    end: number;
}

// Contiguous [start, end) ranges, one per worker, so results land back in input order
export function chunkRanges(lineCount: number, numWorkers: number): LineChunk[] {
    const chunks: LineChunk[] = [];
    if (lineCount === 0 || numWorkers < 1) return chunks;

    const chunkSize = Math.ceil(lineCount / numWorkers);
    for (let start = 0; start < lineCount; start += chunkSize) {
        chunks.push({ start, end: Math.min(start + chunkSize, lineCount) });
    }
    return chunks;
}

export function placeResults(results: string[], start: number, chunkResults: string[]): void {
    for (let i = 0; i < chunkResults.length; i++) {
        results[start + i] = chunkResults[i];
    }
}

export async function preTokenizeParallel(options: ParallelOptions, lines: string[]): Promise<string[]> {
    const numWorkers = resolveWorkerCount(options.threads);
    console.log(`Using ${numWorkers} worker threads...`);

    const workerPath = path.join(__dirname, 'worker.js');
    const results: string[] = new Array(lines.length);

    const workerPromises = chunkRanges(lines.length, numWorkers).map(({ start, end }) => {
        const chunk = lines.slice(start, end);

        return new Promise<void>((resolve, reject) => {
            const data: WorkerData = { vocabPath: options.vocabPath };
            const worker = new Worker(workerPath, { workerData: data });
            let settled = false;

            worker.on('message', (msg: unknown) => {
                if (!isWorkerReply(msg)) return;

                if (msg.type === 'ready') {
                    const request: PreTokenizeMessage = { type: 'pretokenize', lines: chunk };
                    worker.postMessage(request);
                } else {
                    placeResults(results, start, msg.results);
                    settled = true;
                    worker.terminate().then(() => resolve(), reject);
                }
            });

            worker.on('error', reject);
            worker.on('exit', (code) => {
                if (!settled) {
                    reject(new Error(`Worker exited with code ${code}`));
                }
            });
        });
    });

    await Promise.all(workerPromises);
    return results;
}
