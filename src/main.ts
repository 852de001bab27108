import type { Server } from 'node:http';
import type { DeliveryOutcome, ResponseSource } from './types/delivery.js';
import { ConfigError } from './types/errors.js';
import { getConfig, getConfigValue, type PacingConfig } from './config/config-loader.js';
import { createDeliveryPipeline, type DeliveryPipeline, type PipelineDeps } from './core/pipeline.js';
import { startApiServer } from './api/router.js';
import { TelegramHandler } from './interfaces/telegram_handler.js';
import { logThought } from './utils/logger.js';

export interface PacingAppDeps {
    /** Produces the answer for each turn; the pipeline only paces it. */
    source: ResponseSource;
    /** Defaults to the loaded config file. */
    config?: PacingConfig;
    onOutcome?: PipelineDeps['onOutcome'];
}

export interface PacingApp {
    pipeline: DeliveryPipeline;
    telegram: TelegramHandler;
    server: Server;
    /** Stop polling, cancel every delivery and close the control plane. */
    stop(): Promise<DeliveryOutcome[]>;
}

/**
 * Start the bot: a polling Telegram handler as both inbound channel and
 * delivery sink, the delivery pipeline between them, and the control plane.
 */
export function startPacing(deps: PacingAppDeps): PacingApp {
    const config = deps.config ?? getConfig();
    if (!config.telegram.enabled) {
        throw new ConfigError('missing_channel', 'telegram.enabled', 'No messaging channel is enabled; set telegram.enabled.');
    }
    const token = getConfigValue('TELEGRAM_BOT_TOKEN') ?? config.telegram.botToken;
    if (!token) {
        throw new ConfigError(
            'missing_credentials',
            'telegram.botToken',
            'Telegram is enabled but no bot token is configured (telegram.botToken or TELEGRAM_BOT_TOKEN).',
        );
    }

    const telegram = new TelegramHandler(token, {
        polling: true,
        convertMarkdown: config.delivery.convertMarkdown,
    });

    let pipeline: DeliveryPipeline;
    try {
        pipeline = createDeliveryPipeline({
            sink: telegram,
            channel: telegram,
            source: deps.source,
            config,
            onOutcome: deps.onOutcome,
        });
    } catch (err) {
        telegram.stop();
        throw err;
    }

    const server = startApiServer({
        scheduler: pipeline.scheduler,
        tracker: pipeline.tracker,
        coordinator: pipeline.dispatcher.coordinator,
    });

    console.log('[Pacing] Telegram delivery started.');
    void logThought('[Pacing] Telegram delivery started.');

    return {
        pipeline,
        telegram,
        server,
        async stop() {
            const outcomes = await pipeline.dispatcher.shutdown();
            await new Promise<void>((resolve, reject) => {
                server.close((err) => (err ? reject(err) : resolve()));
            });
            void logThought(`[Pacing] Stopped; ${outcomes.length} delivery(ies) cancelled.`);
            return outcomes;
        },
    };
}
