import { describe, it, expect } from 'vitest';
import { createLogger } from '../src/Logger.js';

describe('createLogger', () => {
    it('defaults to info', () => {
        expect(createLogger({}).level).toBe('info');
    });

    it('honours LOG_LEVEL', () => {
        expect(createLogger({ LOG_LEVEL: 'warn' }).level).toBe('warn');
    });
});
