import * as fs from 'fs/promises';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import type { DelaySpec, SplitConfig } from '../types/delivery.js';
import { DELAY_STRATEGIES, SPLIT_MODES } from '../types/delivery.js';
import { ConfigError, type ConfigErrorCode } from '../types/errors.js';
import { DEFAULT_DELAY_SPEC, validateDelaySpec } from '../services/delay-policy.js';
import { DEFAULT_SPLIT_CONFIG, validateSplitConfig } from '../services/response-splitter.js';
import { MODE_POLICY_SETTINGS, type ModePolicySetting } from '../services/mode-selector.js';
import type { PlanOptions } from '../services/delivery-plan.js';
import type { DeliverySchedulerOptions } from '../services/delivery-scheduler.js';
import type { InterruptCoordinatorOptions } from '../services/interrupt-coordinator.js';

export interface DeliveryConfig {
    split: SplitConfig;
    delay: DelaySpec;
    typingEnabled: boolean;
    typingIdleMs: number;
    firstMessageDelayMs: number;
    retryCount: number;
    retryBackoffMs: number;
    dispatchTimeoutMs: number;
    /** Send chunks as platform HTML rendered from their Markdown. */
    convertMarkdown: boolean;
}

export interface InterruptConfig {
    policy: ModePolicySetting;
    maxQueuedPerChat: number;
}

export interface PacingConfig {
    runtime: {
        apiSecret: string;
        apiPort: number;
    };
    telegram: {
        enabled: boolean;
        botToken: string;
    };
    delivery: DeliveryConfig;
    interrupts: InterruptConfig;
}

export const DEFAULT_CONFIG: PacingConfig = {
    runtime: {
        apiSecret: '',
        apiPort: 3100,
    },
    telegram: {
        enabled: false,
        botToken: '',
    },
    delivery: {
        split: { ...DEFAULT_SPLIT_CONFIG },
        delay: { ...DEFAULT_DELAY_SPEC },
        typingEnabled: true,
        typingIdleMs: 0,
        firstMessageDelayMs: 0,
        retryCount: 2,
        retryBackoffMs: 1000,
        dispatchTimeoutMs: 15_000,
        convertMarkdown: true,
    },
    interrupts: {
        policy: 'auto',
        maxQueuedPerChat: 5,
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.PACING_CONFIG_PATH) {
        return path.resolve(process.env.PACING_CONFIG_PATH);
    }
    return path.join(process.cwd(), 'pacing.json');
}

export async function readConfig(overridePath?: string): Promise<PacingConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return mergeWithDefaults({});
        }
        throw new Error(`Failed to read config file at ${targetPath}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return mergeWithDefaults(parseConfigJson(rawData, targetPath));
}

function parseConfigJson(rawData: string, targetPath: string): unknown {
    try {
        return JSON.parse(rawData);
    } catch (error) {
        throw new Error(`Failed to parse config file at ${targetPath}: ${error instanceof Error ? error.message : String(error)}`);
    }
}

// ── Merging ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(parent: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = parent[key];
    return isRecord(value) ? value : {};
}

function readNumber(
    record: Record<string, unknown>,
    key: string,
    fallback: number,
    code: ConfigErrorCode,
    field: string,
): number {
    const value = record[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ConfigError(code, field, `${field} must be a number (got ${JSON.stringify(value)}).`);
    }
    return value;
}

function readBoolean(record: Record<string, unknown>, key: string, fallback: boolean): boolean {
    const value = record[key];
    return typeof value === 'boolean' ? value : fallback;
}

function readString(record: Record<string, unknown>, key: string, fallback: string): string {
    const value = record[key];
    return typeof value === 'string' ? value : fallback;
}

function readChoice<T extends string>(
    record: Record<string, unknown>,
    key: string,
    choices: readonly T[],
    fallback: T,
    code: ConfigErrorCode,
    field: string,
): T {
    const value = record[key];
    if (value === undefined) return fallback;
    const match = choices.find((choice) => choice === value);
    if (match === undefined) {
        throw new ConfigError(code, field, `${field} must be one of ${choices.join(', ')} (got ${JSON.stringify(value)}).`);
    }
    return match;
}

/** Overlay a parsed config file on the defaults. Wrongly typed values raise `ConfigError`. */
export function mergeWithDefaults(loaded: unknown): PacingConfig {
    const root = isRecord(loaded) ? loaded : {};
    const defaults = DEFAULT_CONFIG;

    const runtime = section(root, 'runtime');
    const telegram = section(root, 'telegram');
    const delivery = section(root, 'delivery');
    const split = section(delivery, 'split');
    const delay = section(delivery, 'delay');
    const interrupts = section(root, 'interrupts');

    return {
        runtime: {
            apiSecret: readString(runtime, 'apiSecret', defaults.runtime.apiSecret),
            apiPort: readNumber(runtime, 'apiPort', defaults.runtime.apiPort, 'invalid_timing', 'runtime.apiPort'),
        },
        telegram: {
            enabled: readBoolean(telegram, 'enabled', defaults.telegram.enabled),
            botToken: readString(telegram, 'botToken', defaults.telegram.botToken),
        },
        delivery: {
            split: {
                mode: readChoice(split, 'mode', SPLIT_MODES, defaults.delivery.split.mode, 'invalid_split_mode', 'delivery.split.mode'),
                maxChunkLength: readNumber(split, 'maxChunkLength', defaults.delivery.split.maxChunkLength, 'invalid_chunk_length', 'delivery.split.maxChunkLength'),
                minChunkLength: readNumber(split, 'minChunkLength', defaults.delivery.split.minChunkLength, 'invalid_chunk_length', 'delivery.split.minChunkLength'),
            },
            delay: {
                strategy: readChoice(delay, 'strategy', DELAY_STRATEGIES, defaults.delivery.delay.strategy, 'invalid_delay_strategy', 'delivery.delay.strategy'),
                minMs: readNumber(delay, 'minMs', defaults.delivery.delay.minMs, 'invalid_delay', 'delivery.delay.minMs'),
                maxMs: readNumber(delay, 'maxMs', defaults.delivery.delay.maxMs, 'invalid_delay', 'delivery.delay.maxMs'),
                msPerChar: readNumber(delay, 'msPerChar', defaults.delivery.delay.msPerChar, 'invalid_delay', 'delivery.delay.msPerChar'),
            },
            typingEnabled: readBoolean(delivery, 'typingEnabled', defaults.delivery.typingEnabled),
            typingIdleMs: readNumber(delivery, 'typingIdleMs', defaults.delivery.typingIdleMs, 'invalid_timing', 'delivery.typingIdleMs'),
            firstMessageDelayMs: readNumber(delivery, 'firstMessageDelayMs', defaults.delivery.firstMessageDelayMs, 'invalid_timing', 'delivery.firstMessageDelayMs'),
            retryCount: readNumber(delivery, 'retryCount', defaults.delivery.retryCount, 'invalid_retry', 'delivery.retryCount'),
            retryBackoffMs: readNumber(delivery, 'retryBackoffMs', defaults.delivery.retryBackoffMs, 'invalid_retry', 'delivery.retryBackoffMs'),
            dispatchTimeoutMs: readNumber(delivery, 'dispatchTimeoutMs', defaults.delivery.dispatchTimeoutMs, 'invalid_timing', 'delivery.dispatchTimeoutMs'),
            convertMarkdown: readBoolean(delivery, 'convertMarkdown', defaults.delivery.convertMarkdown),
        },
        interrupts: {
            policy: readChoice(interrupts, 'policy', MODE_POLICY_SETTINGS, defaults.interrupts.policy, 'invalid_policy', 'interrupts.policy'),
            maxQueuedPerChat: readNumber(interrupts, 'maxQueuedPerChat', defaults.interrupts.maxQueuedPerChat, 'invalid_policy', 'interrupts.maxQueuedPerChat'),
        },
    };
}

// ── Validation ──────────────────────────────────────────────────────────────

export interface ResolvedDeliveryOptions {
    plan: PlanOptions;
    scheduler: Pick<
        DeliverySchedulerOptions,
        | 'delay'
        | 'typingEnabled'
        | 'typingIdleMs'
        | 'firstMessageDelayMs'
        | 'retryCount'
        | 'retryBackoffMs'
        | 'dispatchTimeoutMs'
    >;
    interrupts: InterruptCoordinatorOptions;
    policy: ModePolicySetting;
}

function requireNonNegative(value: number, code: ConfigErrorCode, field: string, integer = false): number {
    if (!Number.isFinite(value) || value < 0 || (integer && !Number.isInteger(value))) {
        const kind = integer ? 'a non-negative integer' : 'a non-negative number';
        throw new ConfigError(code, field, `${field} must be ${kind} (got ${value}).`);
    }
    return value;
}

/**
 * Validate the delivery and interrupt sections and shape them into the options
 * the planner, scheduler and coordinator take.
 */
export function resolveDeliveryOptions(config: PacingConfig = getConfig()): ResolvedDeliveryOptions {
    const { delivery, interrupts } = config;
    const split = validateSplitConfig({ ...delivery.split });
    const delay = validateDelaySpec({ ...delivery.delay });

    requireNonNegative(delivery.retryCount, 'invalid_retry', 'delivery.retryCount', true);
    requireNonNegative(delivery.retryBackoffMs, 'invalid_retry', 'delivery.retryBackoffMs');
    requireNonNegative(delivery.typingIdleMs, 'invalid_timing', 'delivery.typingIdleMs');
    requireNonNegative(delivery.firstMessageDelayMs, 'invalid_timing', 'delivery.firstMessageDelayMs');
    requireNonNegative(delivery.dispatchTimeoutMs, 'invalid_timing', 'delivery.dispatchTimeoutMs');

    if (!Number.isInteger(interrupts.maxQueuedPerChat) || interrupts.maxQueuedPerChat < 1) {
        throw new ConfigError(
            'invalid_policy',
            'interrupts.maxQueuedPerChat',
            `interrupts.maxQueuedPerChat must be a positive integer (got ${interrupts.maxQueuedPerChat}).`,
        );
    }

    return {
        plan: { split, delay },
        scheduler: {
            delay,
            typingEnabled: delivery.typingEnabled,
            typingIdleMs: delivery.typingIdleMs,
            firstMessageDelayMs: delivery.firstMessageDelayMs,
            retryCount: delivery.retryCount,
            retryBackoffMs: delivery.retryBackoffMs,
            dispatchTimeoutMs: delivery.dispatchTimeoutMs,
        },
        interrupts: { maxQueuedPerChat: interrupts.maxQueuedPerChat },
        policy: interrupts.policy,
    };
}

// ── Flat Key Access ─────────────────────────────────────────────────────────

let cachedConfig: PacingConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): PacingConfig {
    const configPath = getConfigPath();
    if (existsSync(configPath)) {
        const content = readFileSync(configPath, 'utf8');
        cachedConfig = mergeWithDefaults(parseConfigJson(content, configPath));
        return cachedConfig;
    }
    cachedConfig = mergeWithDefaults({});
    return cachedConfig;
}

export function getConfig(): PacingConfig {
    return cachedConfig ?? reloadConfigSync();
}

const ALLOWED_ENV_OVERRIDES: ReadonlySet<string> = new Set([
    'API_PORT',
    'API_SECRET',
    'TELEGRAM_BOT_TOKEN',
]);

/**
 * Gets a configured value from the config file (mapped), or from `process.env`
 * for the keys that may be overridden there.
 */
export function getConfigValue(key: string): string | undefined {
    const config = getConfig();
    let jsonValue: unknown = undefined;

    switch (key) {
        case 'API_SECRET': jsonValue = config.runtime.apiSecret; break;
        case 'API_PORT': jsonValue = config.runtime.apiPort; break;
        case 'TELEGRAM_ENABLED': jsonValue = config.telegram.enabled; break;
        case 'TELEGRAM_BOT_TOKEN': jsonValue = config.telegram.botToken; break;
        case 'DELIVERY_SPLIT_MODE': jsonValue = config.delivery.split.mode; break;
        case 'DELIVERY_MAX_CHUNK_LENGTH': jsonValue = config.delivery.split.maxChunkLength; break;
        case 'DELIVERY_MIN_CHUNK_LENGTH': jsonValue = config.delivery.split.minChunkLength; break;
        case 'DELIVERY_DELAY_STRATEGY': jsonValue = config.delivery.delay.strategy; break;
        case 'DELIVERY_TYPING_ENABLED': jsonValue = config.delivery.typingEnabled; break;
        case 'DELIVERY_RETRY_COUNT': jsonValue = config.delivery.retryCount; break;
        case 'DELIVERY_CONVERT_MARKDOWN': jsonValue = config.delivery.convertMarkdown; break;
        case 'INTERRUPT_POLICY': jsonValue = config.interrupts.policy; break;
        case 'INTERRUPT_MAX_QUEUED': jsonValue = config.interrupts.maxQueuedPerChat; break;
    }

    const envValue = process.env[key];
    if (ALLOWED_ENV_OVERRIDES.has(key) && envValue !== undefined && envValue.trim() !== '') {
        return envValue;
    }

    if (jsonValue !== undefined && jsonValue !== null && String(jsonValue).trim() !== '') {
        return String(jsonValue);
    }

    return undefined;
}
