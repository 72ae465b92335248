import { parentPort, workerData } from 'worker_threads';
import { isPreTokenizeMessage, isWorkerData } from './messages';
import type { ResultsMessage } from './messages';
import { SandhiSplitter } from './splitter';
import { Vocabulary } from './vocabulary';

async function main() {
    const port = parentPort;
    if (!port) {
        throw new Error('worker.js must be started as a worker thread');
    }
    const data: unknown = workerData;
    if (!isWorkerData(data)) {
        throw new Error('Worker started without a vocabulary path');
    }

    // Load vocabulary in worker
    const vocabulary = await Vocabulary.load(data.vocabPath);
    const splitter = new SandhiSplitter(vocabulary);

    // Signal ready
    port.postMessage({ type: 'ready' });

    port.on('message', (msg: unknown) => {
        if (!isPreTokenizeMessage(msg)) return;

        const results: string[] = new Array(msg.lines.length);
        for (let i = 0; i < msg.lines.length; i++) {
            results[i] = splitter.preTokenizeLine(msg.lines[i]);
        }
        const response: ResultsMessage = { type: 'results', results };
        port.postMessage(response);
    });
}

main().catch(err => {
    console.error('Worker error:', err);
    process.exit(1);
});
