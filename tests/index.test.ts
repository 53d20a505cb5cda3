import { describe, it, expect } from 'vitest';
import { DocumentValidationError, InvalidInputError, silentLogger, synthesize } from '../src/index.js';

describe('synthesize', () => {
    it('rejects a malformed metadata document before building a pipeline', async () => {
        const document = { structure: {}, statistics: {}, data_quality: {} };

        await expect(synthesize(document, { logger: silentLogger })).rejects.toBeInstanceOf(DocumentValidationError);
    });

    it('rejects input that is neither records nor a column map', async () => {
        await expect(synthesize('not a table', { logger: silentLogger })).rejects.toBeInstanceOf(InvalidInputError);
    });
});
