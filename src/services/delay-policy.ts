import type { DelaySpec, MessageChunk } from '../types/delivery.js';
import { DELAY_STRATEGIES } from '../types/delivery.js';
import { ConfigError } from '../types/errors.js';

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export interface DelayPolicy {
    readonly spec: DelaySpec;
    /** Wait before releasing `chunk`. Random strategies draw from the policy's own source. */
    nextDelay(chunk: Pick<MessageChunk, 'text'>): number;
    /** Deterministic expected delay for a chunk of this text. */
    estimate(text: string): number;
}

export const DEFAULT_DELAY_SPEC: DelaySpec = {
    strategy: 'uniform',
    minMs: 1000,
    maxMs: 5000,
    msPerChar: 40,
};

/**
 * Mulberry32: small, fast and good enough for pacing jitter. Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function validateDelaySpec(spec: DelaySpec): DelaySpec {
    if (!DELAY_STRATEGIES.includes(spec.strategy)) {
        throw new ConfigError('invalid_delay_strategy', 'strategy', `Unknown delay strategy '${String(spec.strategy)}'.`);
    }
    for (const field of ['minMs', 'maxMs', 'msPerChar'] as const) {
        const value = spec[field];
        if (!Number.isFinite(value) || value < 0) {
            throw new ConfigError('invalid_delay', field, `${field} must be a non-negative number (got ${value}).`);
        }
    }
    if (spec.minMs > spec.maxMs) {
        throw new ConfigError('invalid_delay', 'minMs', `minMs (${spec.minMs}) exceeds maxMs (${spec.maxMs}).`);
    }
    return spec;
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

/**
 * Build a delay policy for one session.
 *
 * `constant` waits `minMs`; `uniform` draws from `[minMs, maxMs]`; `proportional`
 * emulates typing speed (`msPerChar` per character) clamped to `[minMs, maxMs]`.
 */
export function createDelayPolicy(spec: DelaySpec, random: RandomSource = Math.random): DelayPolicy {
    const validated = validateDelaySpec({ ...spec });

    const estimate = (text: string): number => {
        switch (validated.strategy) {
            case 'none':
                return 0;
            case 'constant':
                return validated.minMs;
            case 'uniform':
                return Math.round((validated.minMs + validated.maxMs) / 2);
            case 'proportional':
                return Math.round(clamp(text.length * validated.msPerChar, validated.minMs, validated.maxMs));
        }
    };

    return {
        spec: validated,
        estimate,
        nextDelay(chunk) {
            if (validated.strategy !== 'uniform') return estimate(chunk.text);
            return Math.round(validated.minMs + random() * (validated.maxMs - validated.minMs));
        },
    };
}
