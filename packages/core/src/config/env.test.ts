import { describe, it, expect } from 'vitest';
import { parseEnvironment, loadEnvironment, resolvePeerDestination } from './env.js';
import { ConfigErrorCode } from './error-codes.js';
import { PacerRuntimeError } from '../errors/runtime-error.js';

describe('parseEnvironment', () => {
    it('applies defaults when nothing is set', () => {
        const env = parseEnvironment({});

        expect(env.LOG_LEVEL).toBe('info');
        expect(env.AWS_REGION).toBe('us-east-1');
        expect(env.MODEL_ID).toBe('us.amazon.nova-lite-v1:0');
        expect(env.ORCHESTRATOR_PORT).toBe(8081);
        expect(env.BIOMECHANICS_PORT).toBe(8082);
        expect(env.LIFESYNC_PORT).toBe(8083);
        expect(env.BIOMECHANICS_URL).toBe('http://localhost:8082');
        expect(env.LIFESYNC_URL).toBe('http://localhost:8083');
        expect(env.A2A_TIMEOUT_MS).toBe(60000);
    });

    it('coerces numeric variables', () => {
        const env = parseEnvironment({ LIFESYNC_PORT: '9003', A2A_TIMEOUT_MS: '5000' });

        expect(env.LIFESYNC_PORT).toBe(9003);
        expect(env.A2A_TIMEOUT_MS).toBe(5000);
    });

    it('treats empty values as unset', () => {
        const env = parseEnvironment({ BIOMECHANICS_ARN: '', LOG_LEVEL: '' });

        expect(env.BIOMECHANICS_ARN).toBeUndefined();
        expect(env.LOG_LEVEL).toBe('info');
    });

    it('rejects invalid values with a config error listing the variable', () => {
        let caught: unknown;
        try {
            parseEnvironment({ ORCHESTRATOR_PORT: 'not-a-port' });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(PacerRuntimeError);
        expect(caught).toMatchObject({ code: ConfigErrorCode.INVALID_ENVIRONMENT });
        expect(caught instanceof Error && caught.message).toContain('ORCHESTRATOR_PORT');
    });
});

describe('loadEnvironment', () => {
    it('reads from the provided environment when the env file is absent', () => {
        const env = loadEnvironment({
            envPath: '/nonexistent/.env',
            processEnv: { MODEL_ID: 'test-model' },
        });

        expect(env.MODEL_ID).toBe('test-model');
    });
});

describe('resolvePeerDestination', () => {
    it('prefers the ARN over the URL', () => {
        const env = parseEnvironment({
            BIOMECHANICS_ARN: 'arn:aws:bedrock-agentcore:us-east-1:000000000000:runtime/planner',
            BIOMECHANICS_URL: 'http://planner.local:9000',
        });

        expect(resolvePeerDestination(env, 'biomechanics')).toBe(
            'arn:aws:bedrock-agentcore:us-east-1:000000000000:runtime/planner'
        );
    });

    it('falls back to the URL', () => {
        const env = parseEnvironment({ LIFESYNC_URL: 'http://validator.local:9000' });

        expect(resolvePeerDestination(env, 'lifesync')).toBe('http://validator.local:9000');
    });
});
