import { describe, it, expect } from 'vitest';
import { extractJsonObject } from './extract-json.js';

describe('extractJsonObject', () => {
    it('reads an object surrounded by prose', () => {
        const text = 'Here is the plan:\n{"workout": {"name": "Legs", "estimatedDuration": 30}}\nEnjoy!';

        expect(extractJsonObject(text, 'workout')).toEqual({
            workout: { name: 'Legs', estimatedDuration: 30 },
        });
    });

    it('prefers a fenced block', () => {
        const text = [
            'I checked {both} tools.',
            '```json',
            '{"analysis": {"hasConflicts": false}}',
            '```',
        ].join('\n');

        expect(extractJsonObject(text, 'analysis')).toEqual({
            analysis: { hasConflicts: false },
        });
    });

    it('falls back to the outermost brace when the nearest one does not parse', () => {
        const text = '{"meta": {"source": "catalog"}, "workout": {"name": "Push"}}';

        expect(extractJsonObject(text, 'workout')).toEqual({
            meta: { source: 'catalog' },
            workout: { name: 'Push' },
        });
    });

    it('returns undefined when the key is absent or the JSON is broken', () => {
        expect(extractJsonObject('{"plan": {}}', 'workout')).toBeUndefined();
        expect(extractJsonObject('{"workout": {"name": }', 'workout')).toBeUndefined();
        expect(extractJsonObject('No JSON at all', 'workout')).toBeUndefined();
    });
});
