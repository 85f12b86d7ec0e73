import { createHash } from 'crypto';

/**
 * Bumped whenever a stage's output format or algorithm changes, so stale cache
 * entries stop matching.
 */
export const CONFIG_VERSION = 'reel-pipeline/1';

type Fingerprintable = string | number | boolean | null | undefined | readonly Fingerprintable[] | { readonly [key: string]: Fingerprintable };

/**
 * JSON serialization with sorted object keys; undefined members are dropped.
 */
export function stableStringify(value: Fingerprintable): string {
    if (value === undefined) {
        return 'null';
    }
    if (value === null || typeof value !== 'object') {
        return JSON.stringify(value);
    }
    if (Array.isArray(value)) {
        return `[${value.map((item) => stableStringify(item)).join(',')}]`;
    }

    const entries = Object.entries(value)
        .filter(([, member]) => member !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, member]) => `${JSON.stringify(key)}:${stableStringify(member)}`);
    return `{${entries.join(',')}}`;
}

/**
 * Stable hash over (stage name, normalized stage inputs, config version).
 */
export function computeFingerprint(
    stage: string,
    inputs: { readonly [key: string]: Fingerprintable },
    version: string = CONFIG_VERSION
): string {
    return createHash('sha256')
        .update(stableStringify({ stage, inputs, version }))
        .digest('hex');
}

/**
 * Trims and collapses whitespace so cosmetic prompt differences share a fingerprint.
 */
export function normalizeText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}
