import type { DeliverySink, ResponseSource } from '../types/delivery.js';
import type { InboundChannel } from '../types/messaging.js';
import { getConfig, resolveDeliveryOptions, type PacingConfig } from '../config/config-loader.js';
import { DeliveryPlanner } from '../services/delivery-plan.js';
import { DeliveryScheduler, type DeliverySchedulerOptions } from '../services/delivery-scheduler.js';
import { DeliveryTracker } from '../services/delivery-tracker.js';
import { ModeSelector } from '../services/mode-selector.js';
import { Dispatcher, type DispatcherOptions } from '../interfaces/dispatcher.js';
import { logThought } from '../utils/logger.js';

export interface PipelineDeps {
    sink: DeliverySink;
    source: ResponseSource;
    channel?: InboundChannel;
    /** Defaults to the loaded config file. */
    config?: PacingConfig;
    onOutcome?: DispatcherOptions['onOutcome'];
    /** Clock and randomness hooks, mainly for tests. */
    runtime?: Pick<DeliverySchedulerOptions, 'sleep' | 'now' | 'randomFactory'>;
}

export interface DeliveryPipeline {
    planner: DeliveryPlanner;
    scheduler: DeliveryScheduler;
    tracker: DeliveryTracker;
    dispatcher: Dispatcher;
}

/**
 * Wire planner, scheduler, tracker and dispatcher from one validated config.
 * Throws `ConfigError` before anything is started when the config is invalid.
 */
export function createDeliveryPipeline(deps: PipelineDeps): DeliveryPipeline {
    const options = resolveDeliveryOptions(deps.config ?? getConfig());
    const modeSelector = new ModeSelector(options.policy);
    const planner = new DeliveryPlanner({ ...options.plan, modeSelector });
    const tracker = new DeliveryTracker();
    const scheduler = new DeliveryScheduler(deps.sink, {
        ...options.scheduler,
        ...deps.runtime,
        tracker,
    });
    const dispatcher = new Dispatcher(deps.source, scheduler, planner, {
        channel: deps.channel,
        interrupts: options.interrupts,
        onOutcome: deps.onOutcome,
        now: deps.runtime?.now,
    });

    void logThought(
        `[Pipeline] Ready: split=${options.plan.split.mode}/${options.plan.split.maxChunkLength}, delay=${options.plan.delay.strategy}, policy=${options.policy}.`,
    );

    return { planner, scheduler, tracker, dispatcher };
}
