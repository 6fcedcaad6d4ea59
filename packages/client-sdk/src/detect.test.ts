import { describe, it, expect } from 'vitest';
import { classifyDestination } from './detect.js';

describe('classifyDestination', () => {
    it.each([
        'arn:aws:bedrock-agentcore:us-east-1:000000000000:runtime/planner-abc123',
        'arn:aws-us-gov:bedrock-agentcore:us-gov-west-1:000000000000:runtime/validator',
        'arn:aws-cn:bedrock-agentcore:cn-north-1:000000000000:runtime/x',
    ])('selects the managed transport for %s', (destination) => {
        expect(classifyDestination(destination)).toBe('agentcore');
    });

    it.each([
        'http://localhost:8082',
        'https://planner.internal.example/a2a',
        'localhost:8082',
        'arn:aws:incomplete',
        'ARN:AWS:bedrock-agentcore:us-east-1:000000000000:runtime/x',
    ])('selects the HTTP transport for %s', (destination) => {
        expect(classifyDestination(destination)).toBe('http');
    });

    it('returns the same answer on every call', () => {
        const destination = 'arn:aws:bedrock-agentcore:us-east-1:000000000000:runtime/planner';

        expect(new Set(Array.from({ length: 5 }, () => classifyDestination(destination)))).toEqual(
            new Set(['agentcore'])
        );
    });

    it('rejects empty destinations', () => {
        expect(classifyDestination('')).toBeUndefined();
        expect(classifyDestination('   ')).toBeUndefined();
    });
});
