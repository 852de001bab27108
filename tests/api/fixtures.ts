import { vi } from 'vitest';
import { DeliveryScheduler } from '../../src/services/delivery-scheduler.js';
import { DeliveryTracker } from '../../src/services/delivery-tracker.js';
import type { DeliveryPlan, DeliverySink } from '../../src/types/delivery.js';

export const createPlan = (chatId: string, texts: string[] = ['one', 'two']): DeliveryPlan => ({
  planId: `plan-${chatId}`,
  requestId: `req-${chatId}`,
  chatId,
  chunks: texts.map((text, index) => ({ index, text, separator: ' ', estimatedDelayMs: 0 })),
  modePolicy: 'answer_safe',
  kind: 'answer',
  createdAt: new Date(0).toISOString(),
});

/** Scheduler whose sink holds every chunk until `release()` is called. */
export function createGatedScheduler() {
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const sendChunk = vi.fn<DeliverySink['sendChunk']>(async () => {
    await gate;
    return { status: 'ack' };
  });
  const tracker = new DeliveryTracker();
  const scheduler = new DeliveryScheduler(
    { sendChunk, setTyping: async () => undefined },
    {
      delay: { strategy: 'none', minMs: 0, maxMs: 0, msPerChar: 0 },
      dispatchTimeoutMs: 0,
      tracker,
      sleep: async () => undefined,
    },
  );
  return { scheduler, tracker, sendChunk, release: () => release() };
}
