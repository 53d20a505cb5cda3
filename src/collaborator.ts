/**
 * synthprint - Routine Collaborator
 *
 * Asks a model to write a generation routine for a metadata document.
 *
 * Features:
 * - Forced tool call, so the code arrives as structured input
 * - Output validation (zod) + retry with exponential backoff
 * - Markdown fence stripping and an entry-point check on the returned code
 */

import Anthropic from '@anthropic-ai/sdk';
import {
    AI_DEFAULT_MODEL,
    AI_MAX_RETRIES,
    AI_MAX_TOKENS,
    AI_TEMPERATURE,
    ROUTINE_ENTRY_POINT,
    ROUTINE_TOOL_NAME,
} from './constants.js';
import { ROUTINE_SYSTEM_PROMPT, buildGenerationPrompt } from './prompts.js';
import type { Logger, MetadataDocument } from './types.js';
import { CollaboratorError, consoleLogger, errorMessage } from './types.js';
import { validateRoutineToolInput } from './validation.js';

// ============================================================================
// Types
// ============================================================================

export interface RoutineRequest {
    readonly metadata: MetadataDocument;
    readonly numRows: number;
    readonly matchThreshold: number;
}

/** Anything that can turn a metadata document into routine text */
export interface RoutineAuthor {
    writeRoutine(request: RoutineRequest): Promise<string>;
}

/** The slice of the Anthropic client this module calls */
export interface MessagesClient {
    readonly messages: {
        create(params: Anthropic.MessageCreateParamsNonStreaming): PromiseLike<Pick<Anthropic.Message, 'content'>>;
    };
}

export interface AnthropicRoutineAuthorOptions {
    apiKey?: string;
    /** Injected client; takes precedence over apiKey */
    client?: MessagesClient;
    model?: string;
    maxRetries?: number;
    maxTokens?: number;
    temperature?: number;
    /** Base delay before the second attempt; doubles each retry */
    retryDelayMs?: number;
    logger?: Logger;
}

// ============================================================================
// Tool Definition
// ============================================================================

const ROUTINE_TOOL: Anthropic.Tool = {
    name: ROUTINE_TOOL_NAME,
    description: 'Submit the JavaScript source of the synthetic data generation routine',
    input_schema: {
        type: 'object' as const,
        properties: {
            code: {
                type: 'string',
                description: `Complete JavaScript source defining ${ROUTINE_ENTRY_POINT}()`,
            },
            notes: {
                type: 'string',
                description: 'Optional one-line summary of the distributions used',
            },
        },
        required: ['code'],
    },
};

// ============================================================================
// Code Extraction
// ============================================================================

const FENCED_BLOCK = /```[a-zA-Z]*\s*\n([\s\S]*?)```/;

/**
 * Strip markdown fences and check that the entry point is defined
 *
 * @example
 * extractRoutineCode('```js\nfunction generateSyntheticData() { return []; }\n```')
 * // 'function generateSyntheticData() { return []; }'
 */
export function extractRoutineCode(text: string): string {
    const fenced = FENCED_BLOCK.exec(text);
    const code = (fenced ? fenced[1] : text).trim();

    if (!code.includes(ROUTINE_ENTRY_POINT)) {
        throw new CollaboratorError(`Returned code does not define ${ROUTINE_ENTRY_POINT}()`, text);
    }

    return code;
}

// ============================================================================
// Anthropic Author
// ============================================================================

export class AnthropicRoutineAuthor implements RoutineAuthor {
    private readonly client: MessagesClient;
    private readonly model: string;
    private readonly maxRetries: number;
    private readonly maxTokens: number;
    private readonly temperature: number;
    private readonly retryDelayMs: number;
    private readonly logger: Logger;

    constructor(options: AnthropicRoutineAuthorOptions = {}) {
        this.client = options.client ?? new Anthropic({ apiKey: options.apiKey });
        this.model = options.model ?? AI_DEFAULT_MODEL;
        this.maxRetries = Math.max(1, options.maxRetries ?? AI_MAX_RETRIES);
        this.maxTokens = options.maxTokens ?? AI_MAX_TOKENS;
        this.temperature = options.temperature ?? AI_TEMPERATURE;
        this.retryDelayMs = options.retryDelayMs ?? 1000;
        this.logger = options.logger ?? consoleLogger;
    }

    async writeRoutine(request: RoutineRequest): Promise<string> {
        const prompt = buildGenerationPrompt(request);
        let lastError: unknown;

        for (let attempt = 0; attempt < this.maxRetries; attempt++) {
            try {
                if (attempt > 0) {
                    const delay = Math.pow(2, attempt - 1) * this.retryDelayMs;
                    await new Promise((resolve) => setTimeout(resolve, delay));
                    this.logger.info(`Retry attempt ${attempt + 1}...`);
                }

                const response = await this.client.messages.create({
                    model: this.model,
                    max_tokens: this.maxTokens,
                    temperature: this.temperature,
                    system: ROUTINE_SYSTEM_PROMPT,
                    tools: [ROUTINE_TOOL],
                    tool_choice: { type: 'tool', name: ROUTINE_TOOL_NAME },
                    messages: [{ role: 'user', content: prompt }],
                });

                const toolUse = response.content.find(
                    (block): block is Anthropic.ToolUseBlock => block.type === 'tool_use'
                );

                if (!toolUse || toolUse.name !== ROUTINE_TOOL_NAME) {
                    throw new CollaboratorError('Unexpected response format');
                }

                const input = validateRoutineToolInput(toolUse.input);
                const code = extractRoutineCode(input.code);
                this.logger.debug(`Collaborator returned ${code.length} characters of routine code`);
                return code;
            } catch (error) {
                lastError = error;
                this.logger.warn(`Collaborator attempt ${attempt + 1} failed: ${errorMessage(error)}`);
            }
        }

        throw new CollaboratorError(
            `Routine collaborator failed after ${this.maxRetries} attempts: ${errorMessage(lastError)}`,
            undefined,
            lastError
        );
    }
}
