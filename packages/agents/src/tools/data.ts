import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';
import { toErrorMessage } from '@pacer/core';
import { AgentError } from '../errors.js';

const DATA_DIR = new URL('../../data/', import.meta.url);

/**
 * Read and validate one of the mocked data files shipped with the package.
 */
export function loadDataFile<T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const path = fileURLToPath(new URL(fileName, DATA_DIR));

    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw AgentError.dataFileInvalid(fileName, [toErrorMessage(error)]);
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        throw AgentError.dataFileInvalid(
            fileName,
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    return parsed.data;
}
