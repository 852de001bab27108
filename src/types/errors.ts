import type { ChatId, SplitMode } from './delivery.js';

export type ConfigErrorCode =
  | 'invalid_chunk_length'
  | 'chunk_length_order'
  | 'invalid_split_mode'
  | 'invalid_delay'
  | 'invalid_delay_strategy'
  | 'invalid_retry'
  | 'invalid_timing'
  | 'invalid_policy'
  | 'missing_channel'
  | 'missing_credentials';

/** Invalid delivery configuration. Raised when a plan or config is built, never at send time. */
export class ConfigError extends Error {
  readonly code: ConfigErrorCode;
  readonly field: string;

  constructor(code: ConfigErrorCode, field: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.field = field;
  }
}

/** A split that could not be honored as requested. Always absorbed by falling back to `none`. */
export class SplitError extends Error {
  readonly requestedMode: SplitMode;
  readonly appliedMode: SplitMode;

  constructor(requestedMode: SplitMode, appliedMode: SplitMode, message: string) {
    super(message);
    this.name = 'SplitError';
    this.requestedMode = requestedMode;
    this.appliedMode = appliedMode;
  }
}

export type DispatchErrorKind = 'transient' | 'permanent';

export class DispatchError extends Error {
  readonly kind: DispatchErrorKind;
  readonly timedOut: boolean;

  constructor(kind: DispatchErrorKind, message: string, options: { timedOut?: boolean } = {}) {
    super(message);
    this.name = 'DispatchError';
    this.kind = kind;
    this.timedOut = options.timedOut ?? false;
  }

  static from(err: unknown): DispatchError {
    if (err instanceof DispatchError) return err;
    return new DispatchError('transient', err instanceof Error ? err.message : String(err));
  }
}

/** Raised when a plan is started while an `answer_safe` session for the same chat is still running. */
export class SessionConflictError extends Error {
  readonly chatId: ChatId;
  readonly activeSessionId: string;

  constructor(chatId: ChatId, activeSessionId: string) {
    super(`Chat ${chatId} already has an active answer-safe delivery (${activeSessionId}).`);
    this.name = 'SessionConflictError';
    this.chatId = chatId;
    this.activeSessionId = activeSessionId;
  }
}
