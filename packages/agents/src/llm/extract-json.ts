/**
 * Pull a keyed JSON object out of free-form model output.
 */

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/g;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseCandidate(candidate: string, key: string): Record<string, unknown> | undefined {
    try {
        const parsed: unknown = JSON.parse(candidate);
        return isRecord(parsed) && key in parsed ? parsed : undefined;
    } catch {
        return undefined;
    }
}

/**
 * First JSON object in `text` with a top-level `key`. Fenced code blocks are
 * tried first, then spans ending at the last `}` that open before the key.
 */
export function extractJsonObject(text: string, key: string): Record<string, unknown> | undefined {
    for (const match of text.matchAll(FENCED_BLOCK)) {
        const found = parseCandidate((match[1] ?? '').trim(), key);
        if (found) {
            return found;
        }
    }

    const keyIndex = text.indexOf(`"${key}"`);
    if (keyIndex === -1) {
        return undefined;
    }
    const end = text.lastIndexOf('}');
    if (end < keyIndex) {
        return undefined;
    }
    // Nearest brace first, then the outermost one
    const starts = new Set([text.lastIndexOf('{', keyIndex), text.indexOf('{')]);
    for (const start of starts) {
        if (start === -1 || start > keyIndex) {
            continue;
        }
        const found = parseCandidate(text.slice(start, end + 1), key);
        if (found) {
            return found;
        }
    }
    return undefined;
}
