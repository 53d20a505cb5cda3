import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { Logger } from '../src/types.js';

export interface RecordingLogger extends Logger {
    readonly lines: { level: string; message: string }[];
    messages(level: string): string[];
}

export function recordingLogger(): RecordingLogger {
    const lines: { level: string; message: string }[] = [];
    const push = (level: string) => (message: string) => {
        lines.push({ level, message });
    };

    return {
        lines,
        messages: (level) => lines.filter((line) => line.level === level).map((line) => line.message),
        debug: push('debug'),
        info: push('info'),
        warn: push('warn'),
        error: push('error'),
    };
}

export async function tempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
    const dir = await mkdtemp(path.join(tmpdir(), 'synthprint-'));
    return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

/** Clock that only moves when told to */
export function fixedClock(iso: string): { now: () => Date; set: (next: string) => void } {
    let current = new Date(iso);
    return {
        now: () => new Date(current.getTime()),
        set: (next) => {
            current = new Date(next);
        },
    };
}
