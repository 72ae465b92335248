// Messages exchanged between the pipeline and its pre-tokenization workers

export interface WorkerData {
    vocabPath: string;
}

export interface PreTokenizeMessage {
    type: 'pretokenize';
    lines: string[];
}

export interface ReadyMessage {
    type: 'ready';
}

export interface ResultsMessage {
    type: 'results';
    results: string[];
}

export type WorkerReply = ReadyMessage | ResultsMessage;

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(v => typeof v === 'string');
}

export function isWorkerData(value: unknown): value is WorkerData {
    return isObject(value) && typeof value.vocabPath === 'string';
}

export function isPreTokenizeMessage(value: unknown): value is PreTokenizeMessage {
    return isObject(value)
        && value.type === 'pretokenize'
        && isStringArray(value.lines);
}

export function isWorkerReply(value: unknown): value is WorkerReply {
    if (!isObject(value)) return false;
    if (value.type === 'ready') return true;
    return value.type === 'results' && isStringArray(value.results);
}
