/**
 * synthprint - Routine Runners
 *
 * Two ways to execute routine text:
 * - ProcessRunner: a child Node.js process fed a host script on stdin, with
 *   an empty environment, a heap cap and the permission model switched on.
 *   The host runs the routine in a `node:vm` context of its own, so the
 *   routine never sees `require` or `process`, then writes the result as one
 *   marked JSON line on stdout.
 * - InProcessRunner: a `node:vm` context holding only the language
 *   built-ins, with string code generation disabled. Weaker isolation;
 *   only used as a fallback.
 *
 * Both resolve to the routine's result serialized as JSON.
 */

import { spawn } from 'node:child_process';
import vm from 'node:vm';
import {
    DEFAULT_EXECUTION_MEMORY_MB,
    MAX_OUTPUT_BYTES,
    OUTPUT_MARKER,
    ROUTINE_ENTRY_POINT,
} from './constants.js';
import type { ExecutionMode } from './types.js';
import { ExecutionFailure, ExecutionTimeoutError, errorMessage } from './types.js';

export interface RoutineRunner {
    readonly mode: ExecutionMode;
    /** Resolves to the routine's result as JSON text */
    run(routineText: string, timeoutMs: number): Promise<string>;
}

// ============================================================================
// Script Wrapping
// ============================================================================

/**
 * Expression that evaluates the routine's result: a top-level `result`
 * wins, otherwise the entry point is called.
 */
const RESULT_EXPRESSION = `(typeof result !== 'undefined'
        ? result
        : typeof ${ROUTINE_ENTRY_POINT} === 'function'
            ? ${ROUTINE_ENTRY_POINT}()
            : undefined)`;

function resultFunction(): string {
    return `(function () {
    var value = ${RESULT_EXPRESSION};
    if (value === undefined) throw new Error('Routine defines neither ${ROUTINE_ENTRY_POINT}() nor result');
    if (value !== null && typeof value.then === 'function') throw new Error('${ROUTINE_ENTRY_POINT}() must return synchronously');
    return JSON.stringify(value);
})`;
}

export function wrapForContext(routineText: string): string {
    return `globalThis.console = { log() {}, info() {}, warn() {}, error() {}, debug() {} };
${routineText}
;${resultFunction()}();
`;
}

/** Host script for the child process; the routine itself is only ever data */
export function wrapForProcess(routineText: string): string {
    return `'use strict';
const vm = require('node:vm');
const context = vm.createContext(Object.create(null), {
    name: 'synthprint-routine',
    codeGeneration: { strings: false, wasm: false },
});
const script = new vm.Script(${JSON.stringify(wrapForContext(routineText))}, { filename: 'routine.js' });
const output = script.runInContext(context);
if (typeof output !== 'string') throw new Error('Routine produced no result');
process.stdout.write('\\n' + ${JSON.stringify(OUTPUT_MARKER)} + output + '\\n');
`;
}

/** Last marked line of the child's stdout, without the marker */
export function extractMarkedOutput(stdout: string): string | null {
    const lines = stdout.split('\n');
    for (let i = lines.length - 1; i >= 0; i--) {
        const line = lines[i].trimEnd();
        if (line.startsWith(OUTPUT_MARKER)) return line.slice(OUTPUT_MARKER.length);
    }
    return null;
}

// ============================================================================
// Process Runner
// ============================================================================

export interface ProcessRunnerOptions {
    /** Node.js binary; defaults to the running one */
    execPath?: string;
    memoryMb?: number;
    /** Isolation flags passed before the script */
    nodeFlags?: readonly string[];
}

export const DEFAULT_NODE_FLAGS: readonly string[] = ['--experimental-permission', '--disallow-code-generation-from-strings'];

export class ProcessRunner implements RoutineRunner {
    readonly mode = 'isolated' as const;
    private readonly execPath: string;
    private readonly memoryMb: number;
    private readonly nodeFlags: readonly string[];

    constructor(options: ProcessRunnerOptions = {}) {
        this.execPath = options.execPath ?? process.execPath;
        this.memoryMb = options.memoryMb ?? DEFAULT_EXECUTION_MEMORY_MB;
        this.nodeFlags = options.nodeFlags ?? DEFAULT_NODE_FLAGS;
    }

    run(routineText: string, timeoutMs: number): Promise<string> {
        const args = [...this.nodeFlags, `--max-old-space-size=${this.memoryMb}`, '-'];

        return new Promise<string>((resolve, reject) => {
            const child = spawn(this.execPath, args, { env: {}, stdio: ['pipe', 'pipe', 'pipe'] });
            let stdout = '';
            let stderr = '';
            let bytes = 0;
            let timedOut = false;
            let overflow = false;

            const timer = setTimeout(() => {
                timedOut = true;
                child.kill('SIGKILL');
            }, timeoutMs);

            child.stdout.setEncoding('utf8');
            child.stdout.on('data', (chunk: string) => {
                bytes += Buffer.byteLength(chunk);
                if (bytes > MAX_OUTPUT_BYTES) {
                    overflow = true;
                    child.kill('SIGKILL');
                    return;
                }
                stdout += chunk;
            });

            child.stderr.setEncoding('utf8');
            child.stderr.on('data', (chunk: string) => {
                if (stderr.length < 64 * 1024) stderr += chunk;
            });

            child.stdin.on('error', (error) => {
                stderr += `\nstdin: ${error.message}`;
            });

            child.on('error', (error) => {
                clearTimeout(timer);
                reject(new ExecutionFailure(`Could not start routine process: ${error.message}`, this.mode, stderr, error));
            });

            child.on('close', (code, signal) => {
                clearTimeout(timer);

                if (timedOut) {
                    reject(new ExecutionTimeoutError(timeoutMs, this.mode));
                    return;
                }
                if (overflow) {
                    reject(new ExecutionFailure(`Routine output exceeded ${MAX_OUTPUT_BYTES} bytes`, this.mode, stderr));
                    return;
                }
                if (code !== 0) {
                    const reason = signal ? `signal ${signal}` : `exit code ${code}`;
                    reject(new ExecutionFailure(`Routine process failed with ${reason}`, this.mode, stderr));
                    return;
                }

                const output = extractMarkedOutput(stdout);
                if (output === null) {
                    reject(new ExecutionFailure('Routine process produced no result', this.mode, stderr));
                    return;
                }
                resolve(output);
            });

            child.stdin.end(wrapForProcess(routineText));
        });
    }
}

// ============================================================================
// In-Process Runner
// ============================================================================

function isScriptTimeout(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT';
}

export class InProcessRunner implements RoutineRunner {
    readonly mode = 'in-process' as const;

    async run(routineText: string, timeoutMs: number): Promise<string> {
        const context = vm.createContext(Object.create(null), {
            name: 'synthprint-routine',
            codeGeneration: { strings: false, wasm: false },
        });

        let output: unknown;
        try {
            const script = new vm.Script(wrapForContext(routineText), { filename: 'routine.js' });
            output = script.runInContext(context, { timeout: timeoutMs });
        } catch (error) {
            if (isScriptTimeout(error)) throw new ExecutionTimeoutError(timeoutMs, this.mode);
            throw new ExecutionFailure(`Routine failed: ${errorMessage(error)}`, this.mode, undefined, error);
        }

        if (typeof output !== 'string') {
            throw new ExecutionFailure('Routine produced no result', this.mode);
        }
        return output;
    }
}
