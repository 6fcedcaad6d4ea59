import * as path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { LogLevelSchema } from '../logger/schemas.js';
import { ConfigError } from './errors.js';

const PortSchema = z.coerce.number().int().min(1).max(65535);

export const EnvironmentSchema = z.object({
    LOG_LEVEL: LogLevelSchema.default('info'),
    AWS_REGION: z.string().default('us-east-1'),
    MODEL_ID: z.string().default('us.amazon.nova-lite-v1:0'),

    ORCHESTRATOR_PORT: PortSchema.default(8081),
    BIOMECHANICS_PORT: PortSchema.default(8082),
    LIFESYNC_PORT: PortSchema.default(8083),

    ORCHESTRATOR_URL: z.string().url().optional(),
    /** Self URL advertised in the agent card */
    AGENT_URL: z.string().url().optional(),

    BIOMECHANICS_ARN: z.string().optional(),
    BIOMECHANICS_URL: z.string().url().default('http://localhost:8082'),
    LIFESYNC_ARN: z.string().optional(),
    LIFESYNC_URL: z.string().url().default('http://localhost:8083'),

    A2A_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
});

export type PacerEnvironment = z.output<typeof EnvironmentSchema>;

export type PeerName = 'biomechanics' | 'lifesync';

export interface LoadEnvironmentOptions {
    /** Path of the .env file (defaults to `.env` in the working directory) */
    envPath?: string;
    /** Shell environment; defaults to process.env */
    processEnv?: Record<string, string | undefined>;
}

/**
 * Load and validate environment configuration.
 *
 * Priority: shell environment, then .env file, then schema defaults.
 * Empty values count as unset.
 */
export function loadEnvironment(options: LoadEnvironmentOptions = {}): PacerEnvironment {
    const envPath = options.envPath ?? path.join(process.cwd(), '.env');
    const shellEnv = options.processEnv ?? process.env;

    const merged: Record<string, string> = {};

    // processEnv: {} keeps dotenv from mutating process.env
    const fileResult = dotenv.config({ path: envPath, processEnv: {} });
    if (fileResult.error && !isMissingFile(fileResult.error)) {
        throw ConfigError.envFileReadFailed(envPath, fileResult.error.message);
    }
    if (fileResult.parsed) {
        Object.assign(merged, fileResult.parsed);
    }

    for (const [key, value] of Object.entries(shellEnv)) {
        if (value !== undefined && value !== '') {
            merged[key] = value;
        }
    }

    return parseEnvironment(merged);
}

// The .env file is optional
function isMissingFile(error: Error): boolean {
    return 'code' in error && error.code === 'ENOENT';
}

export function parseEnvironment(raw: Record<string, string | undefined>): PacerEnvironment {
    const cleaned = Object.fromEntries(
        Object.entries(raw).filter(([, value]) => value !== undefined && value !== '')
    );
    const result = EnvironmentSchema.safeParse(cleaned);
    if (!result.success) {
        throw ConfigError.invalidEnvironment(
            result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    return result.data;
}

/**
 * Destination identifier for a peer agent. A managed-runtime ARN wins over the
 * direct URL; the string is handed unchanged to the transport classifier.
 */
export function resolvePeerDestination(env: PacerEnvironment, peer: PeerName): string {
    switch (peer) {
        case 'biomechanics':
            return env.BIOMECHANICS_ARN ?? env.BIOMECHANICS_URL;
        case 'lifesync':
            return env.LIFESYNC_ARN ?? env.LIFESYNC_URL;
    }
}
