import type { EngineEvent } from '../types/decision.js';

/** Downstream consumer of engine events (chat, e-mail, dashboards). */
export interface NotificationSink {
  publish(event: EngineEvent): Promise<void>;
}

export type Emit = (event: EngineEvent) => Promise<void>;

/**
 * Fan an event out to every sink. Events are emitted after the transition has
 * committed, so a failing sink is logged and never rolls anything back.
 */
export function createEmitter(sinks: NotificationSink[]): Emit {
  return async event => {
    const results = await Promise.allSettled(sinks.map(sink => sink.publish(event)));
    for (const r of results) {
      if (r.status === 'rejected') {
        const reason = r.reason instanceof Error ? r.reason.message : String(r.reason);
        console.error(`[Events] ${event.type} delivery failed: ${reason}`);
      }
    }
  };
}
