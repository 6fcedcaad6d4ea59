import { describe, it, expect } from 'vitest';
import { parseEnvironment } from '@pacer/core';
import { advertisedUrl, createAgentLogger } from './runtime.js';

describe('advertisedUrl', () => {
    it('prefers AGENT_URL', () => {
        const env = parseEnvironment({ AGENT_URL: 'https://planner.example.com' });
        expect(advertisedUrl(env, env.BIOMECHANICS_URL)).toBe('https://planner.example.com');
    });

    it('falls back to the given URL', () => {
        const env = parseEnvironment({});
        expect(advertisedUrl(env, env.BIOMECHANICS_URL)).toBe('http://localhost:8082');
    });
});

describe('createAgentLogger', () => {
    it('uses the configured level', () => {
        const logger = createAgentLogger(parseEnvironment({ LOG_LEVEL: 'warn' }), 'life-sync');
        expect(logger.getLevel()).toBe('warn');
    });
});
