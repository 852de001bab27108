export * from './types/delivery.js';
export * from './types/errors.js';
export * from './types/messaging.js';
export * from './types/reliability.js';
export * from './types/api.js';

export {
    ResponseSplitter,
    DEFAULT_SPLIT_CONFIG,
    findOpenSpanStart,
    split,
    validateSplitConfig,
} from './services/response-splitter.js';
export type { SplitResult, SplitSegment } from './services/response-splitter.js';
export {
    createDelayPolicy,
    createSeededRandom,
    validateDelaySpec,
    DEFAULT_DELAY_SPEC,
} from './services/delay-policy.js';
export type { DelayPolicy, RandomSource } from './services/delay-policy.js';
export { TypingIndicatorController } from './services/typing-indicator.js';
export type { TypingIndicatorOptions } from './services/typing-indicator.js';
export { ModeSelector, MODE_POLICY_SETTINGS } from './services/mode-selector.js';
export type { ModePolicySetting } from './services/mode-selector.js';
export { DeliveryPlanner, buildDeliveryPlan, toChunks } from './services/delivery-plan.js';
export type { PlanOptions, PlanRequest } from './services/delivery-plan.js';
export { DeliverySession } from './services/delivery-session.js';
export { SessionRegistry } from './services/session-registry.js';
export { DeliveryScheduler } from './services/delivery-scheduler.js';
export type { DeliverySchedulerOptions } from './services/delivery-scheduler.js';
export { DeliveryTracker } from './services/delivery-tracker.js';
export { InterruptCoordinator } from './services/interrupt-coordinator.js';
export type {
    InterruptCoordinatorOptions,
    InterruptDecision,
    TurnHandler,
} from './services/interrupt-coordinator.js';
export { StreamAdapter } from './services/stream-adapter.js';

export { Dispatcher } from './interfaces/dispatcher.js';
export type { DispatcherOptions } from './interfaces/dispatcher.js';
export { TelegramHandler, classifyTelegramError } from './interfaces/telegram_handler.js';

export {
    DEFAULT_CONFIG,
    getConfig,
    getConfigValue,
    readConfig,
    resolveDeliveryOptions,
} from './config/config-loader.js';
export type { PacingConfig } from './config/config-loader.js';
export { createApiApp, startApiServer } from './api/router.js';
export { createDeliveryPipeline } from './core/pipeline.js';
export type { DeliveryPipeline, PipelineDeps } from './core/pipeline.js';
export { startPacing } from './main.js';
export type { PacingApp, PacingAppDeps } from './main.js';
export { withRetry } from './utils/retry.js';
export { escapeTelegramHtml, markdownToTelegramHtml } from './utils/telegram-html.js';
export { logThought, scrubSensitiveText } from './utils/logger.js';
