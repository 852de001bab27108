import { beforeEach, describe, it, expect, vi } from 'vitest';

const bot = vi.hoisted(() => ({
    construct: vi.fn(),
    on: vi.fn(),
    sendMessage: vi.fn(),
    sendChatAction: vi.fn(),
    stopPolling: vi.fn(),
}));

const api = vi.hoisted(() => ({
    startApiServer: vi.fn(),
    close: vi.fn((done: (err?: Error) => void) => done()),
    env: new Map<string, string>(),
}));

vi.mock('node-telegram-bot-api', () => ({
    default: class {
        constructor(token: string, options: unknown) {
            bot.construct(token, options);
        }
        on = bot.on;
        sendMessage = bot.sendMessage;
        sendChatAction = bot.sendChatAction;
        stopPolling = bot.stopPolling;
    },
}));

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn().mockResolvedValue(undefined),
    scrubSensitiveText: (s: string) => s,
}));

vi.mock('../../src/api/router.js', () => ({
    startApiServer: api.startApiServer,
}));

vi.mock('../../src/config/config-loader.js', async (importOriginal) => ({
    ...(await importOriginal<typeof import('../../src/config/config-loader.js')>()),
    getConfigValue: (key: string) => api.env.get(key),
}));

import { startPacing } from '../../src/main.js';
import { DEFAULT_CONFIG, type PacingConfig } from '../../src/config/config-loader.js';
import { ConfigError } from '../../src/types/errors.js';
import type { ResponseSource } from '../../src/types/delivery.js';

const source: ResponseSource = {
    generate: async (turn) => ({ requestId: turn.turnId, mode: 'simple', text: 'Hello.' }),
};

const withTelegram = (telegram: PacingConfig['telegram']): PacingConfig => ({ ...DEFAULT_CONFIG, telegram });

describe('startPacing', () => {
    beforeEach(() => {
        vi.clearAllMocks();
        api.env.clear();
        api.startApiServer.mockReturnValue({ close: api.close });
        bot.stopPolling.mockResolvedValue(undefined);
    });

    it('connects a polling Telegram handler to the pipeline and the control plane', () => {
        const app = startPacing({ source, config: withTelegram({ enabled: true, botToken: 'test-token' }) });

        expect(bot.construct).toHaveBeenCalledWith('test-token', { polling: true });
        expect(bot.on).toHaveBeenCalledWith('message', expect.any(Function));
        expect(api.startApiServer).toHaveBeenCalledWith({
            scheduler: app.pipeline.scheduler,
            tracker: app.pipeline.tracker,
            coordinator: app.pipeline.dispatcher.coordinator,
        });
    });

    it('prefers the bot token from the environment', () => {
        api.env.set('TELEGRAM_BOT_TOKEN', 'env-token');

        startPacing({ source, config: withTelegram({ enabled: true, botToken: 'test-token' }) });

        expect(bot.construct).toHaveBeenCalledWith('env-token', { polling: true });
    });

    it('refuses to start without an enabled channel or a token', () => {
        expect(() => startPacing({ source, config: withTelegram({ enabled: false, botToken: 'test-token' }) })).toThrow(
            ConfigError,
        );

        let caught: unknown;
        try {
            startPacing({ source, config: withTelegram({ enabled: true, botToken: '' }) });
        } catch (err) {
            caught = err;
        }
        expect(caught).toMatchObject({ name: 'ConfigError', code: 'missing_credentials', field: 'telegram.botToken' });
        expect(bot.construct).not.toHaveBeenCalled();
        expect(api.startApiServer).not.toHaveBeenCalled();
    });

    it('stops polling and closes the control plane on stop', async () => {
        const app = startPacing({ source, config: withTelegram({ enabled: true, botToken: 'test-token' }) });

        await expect(app.stop()).resolves.toEqual([]);

        expect(bot.stopPolling).toHaveBeenCalledTimes(1);
        expect(api.close).toHaveBeenCalledTimes(1);
    });
});
