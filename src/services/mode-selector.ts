import type { ChatContext, ModePolicy } from '../types/delivery.js';

/** `auto` derives the policy from the chat context; the others pin it. */
export type ModePolicySetting = 'auto' | ModePolicy;

export const MODE_POLICY_SETTINGS: readonly ModePolicySetting[] = ['auto', 'reply_safe', 'answer_safe'];

/**
 * Decides how a chat's active delivery reacts to new user input.
 *
 * Defaults to `answer_safe`; a delivery that explicitly replies to a specific
 * earlier message is `reply_safe`.
 */
export class ModeSelector {
    readonly #setting: ModePolicySetting;

    constructor(setting: ModePolicySetting = 'auto') {
        this.#setting = setting;
    }

    get setting(): ModePolicySetting {
        return this.#setting;
    }

    modeFor(context: ChatContext): ModePolicy {
        if (this.#setting !== 'auto') return this.#setting;
        return context.replyToMessageId !== undefined ? 'reply_safe' : 'answer_safe';
    }
}
