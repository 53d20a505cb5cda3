import { describe, it, expect, vi } from 'vitest';
import { AnthropicRoutineAuthor, extractRoutineCode } from '../src/collaborator.js';
import { ROUTINE_TOOL_NAME } from '../src/constants.js';
import { profile } from '../src/profile.js';
import { ROUTINE_SYSTEM_PROMPT, buildGenerationPrompt, tolerancePercent } from '../src/prompts.js';
import { detectTable } from '../src/table.js';
import { CollaboratorError, silentLogger } from '../src/types.js';

const ROUTINE = 'function generateSyntheticData() { return []; }';

const metadata = profile(detectTable({ city: ['NY', 'NY', 'LA'] }), {
    now: () => new Date('2024-06-01T12:00:00Z'),
    logger: silentLogger,
});

const request = { metadata, numRows: 5, matchThreshold: 0.8 };

function toolResponse(input: unknown) {
    return { content: [{ type: 'tool_use', id: 'toolu_test', name: ROUTINE_TOOL_NAME, input }] };
}

describe('extractRoutineCode', () => {
    it('strips markdown fences', () => {
        expect(extractRoutineCode('```javascript\n' + ROUTINE + '\n```')).toBe(ROUTINE);
    });

    it('keeps unfenced code as is', () => {
        expect(extractRoutineCode(`  ${ROUTINE}\n`)).toBe(ROUTINE);
    });

    it('requires the entry point', () => {
        expect(() => extractRoutineCode('function main() {}')).toThrow(CollaboratorError);
    });
});

describe('buildGenerationPrompt', () => {
    it('embeds placeholders instead of real values', () => {
        const prompt = buildGenerationPrompt(request);

        expect(prompt).toContain('"value": "value_0"');
        expect(prompt).not.toContain('"NY"');
        expect(prompt).toContain('with 5 rows');
        expect(prompt).toContain('Stay within 4% of the statistical properties');
    });

    it('adds data dictionary constraints when present', () => {
        const prompt = buildGenerationPrompt({
            ...request,
            metadata: { ...metadata, generation_constraints: 'city is one of NY, LA' },
        });

        expect(prompt).toContain('## Data Dictionary Constraints (MUST be followed)\n\ncity is one of NY, LA');
    });

    it('carries clinical vocabulary for clinically named columns', () => {
        const clinical = profile(detectTable({ diagnosis: ['a', 'b', 'a'] }), {
            now: () => new Date('2024-06-01T12:00:00Z'),
            logger: silentLogger,
        });

        const prompt = buildGenerationPrompt({ ...request, metadata: clinical });

        expect(prompt).toContain('"is_clinical": true');
        expect(prompt).toContain('"type": "diagnosis"');
        expect(ROUTINE_SYSTEM_PROMPT).toContain('draw its values from suggested_values');
    });

    it('scales tolerance with the threshold', () => {
        expect(tolerancePercent(0.8)).toBe(4);
        expect(tolerancePercent(1)).toBe(0);
    });
});

describe('AnthropicRoutineAuthor', () => {
    it('returns the code from a forced tool call', async () => {
        const create = vi.fn().mockResolvedValue(toolResponse({ code: '```js\n' + ROUTINE + '\n```' }));
        const author = new AnthropicRoutineAuthor({ client: { messages: { create } }, logger: silentLogger });

        const code = await author.writeRoutine(request);

        expect(code).toBe(ROUTINE);
        expect(create).toHaveBeenCalledTimes(1);
        expect(create.mock.calls[0][0]).toMatchObject({
            tool_choice: { type: 'tool', name: ROUTINE_TOOL_NAME },
            temperature: 0.3,
            max_tokens: 4000,
        });
    });

    it('retries after an unusable response', async () => {
        const create = vi
            .fn()
            .mockResolvedValueOnce({ content: [{ type: 'text', text: 'here you go' }] })
            .mockResolvedValueOnce(toolResponse({ code: ROUTINE }));
        const author = new AnthropicRoutineAuthor({
            client: { messages: { create } },
            retryDelayMs: 0,
            logger: silentLogger,
        });

        expect(await author.writeRoutine(request)).toBe(ROUTINE);
        expect(create).toHaveBeenCalledTimes(2);
    });

    it('gives up after the configured attempts', async () => {
        const create = vi.fn().mockRejectedValue(new Error('overloaded'));
        const author = new AnthropicRoutineAuthor({
            client: { messages: { create } },
            maxRetries: 3,
            retryDelayMs: 0,
            logger: silentLogger,
        });

        const failure = author.writeRoutine(request);

        await expect(failure).rejects.toBeInstanceOf(CollaboratorError);
        await expect(failure).rejects.toThrow('Routine collaborator failed after 3 attempts: overloaded');
        expect(create).toHaveBeenCalledTimes(3);
    });

    it('rejects tool input without code', async () => {
        const create = vi.fn().mockResolvedValue(toolResponse({ notes: 'forgot the code' }));
        const author = new AnthropicRoutineAuthor({
            client: { messages: { create } },
            maxRetries: 1,
            logger: silentLogger,
        });

        await expect(author.writeRoutine(request)).rejects.toThrow('Routine tool input validation failed');
    });
});
