/**
 * Transport selection
 *
 * A pure function of the destination string. Managed-runtime resource names
 * (`arn:<partition>:...`) go through the managed invocation transport; every
 * other non-empty string is treated as an HTTP endpoint.
 */

export type TransportKind = 'agentcore' | 'http';

const RESOURCE_NAME_PATTERN = /^arn:aws(-[a-z]+)*:[^:\s]+:[^:\s]*:[^:\s]*:\S+$/;

export function isResourceName(destination: string): boolean {
    return RESOURCE_NAME_PATTERN.test(destination);
}

/**
 * @returns undefined for an empty destination
 */
export function classifyDestination(destination: string): TransportKind | undefined {
    const trimmed = destination.trim();
    if (trimmed.length === 0) {
        return undefined;
    }
    return isResourceName(trimmed) ? 'agentcore' : 'http';
}
