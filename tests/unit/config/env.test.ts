import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../../../src/config/env';

describe('loadConfig', () => {
    it('should apply defaults to an empty environment', () => {
        const config = loadConfig({});

        expect(config.nodeEnv).toBe('development');
        expect(config.port).toBe(3000);
        expect(config.openai).toEqual({ apiKey: undefined, model: 'gpt-4o-mini', temperature: 0.1 });
        expect(config.scoring).toEqual({ passThreshold: 0.7, knowledgeLevelCuts: [0.4, 0.7, 0.85] });
        expect(config.joinTokenTtlHours).toBe(48);
        expect(config.narrativeTimeoutMs).toBe(15000);
        expect(config.evaluationQueue).toEqual({ maxAttempts: 5, backoffMs: 1000 });
    });

    it('should parse numbers and knowledge level cuts from strings', () => {
        const config = loadConfig({
            PORT: '8080',
            PASS_THRESHOLD: '0.6',
            KNOWLEDGE_LEVEL_CUTS: '0.3, 0.5 ,0.9',
            JOIN_TOKEN_TTL_HOURS: '24'
        });

        expect(config.port).toBe(8080);
        expect(config.scoring).toEqual({ passThreshold: 0.6, knowledgeLevelCuts: [0.3, 0.5, 0.9] });
        expect(config.joinTokenTtlHours).toBe(24);
    });

    it.each([
        ['a pass threshold above 1', { PASS_THRESHOLD: '1.5' }],
        ['descending cuts', { KNOWLEDGE_LEVEL_CUTS: '0.8,0.5,0.9' }],
        ['too few cuts', { KNOWLEDGE_LEVEL_CUTS: '0.4,0.7' }],
        ['an unknown log level', { LOG_LEVEL: 'verbose' }]
    ])('should reject %s', (_label, env) => {
        expect(() => loadConfig(env)).toThrow(ZodError);
    });
});
