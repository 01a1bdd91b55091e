/**
 * Extension-point events emitted around every orchestrated call.
 *
 * Listeners run synchronously in subscription order. A listener that throws
 * is logged and skipped; the call continues.
 */

import type { LlmError } from "./types/errors.js";
import type { Operation } from "./types/enums.js";
import type { Message } from "./types/message.js";
import type { ResolvedOptions } from "./types/request.js";
import type { UsageStatistics } from "./types/response.js";
import { silentLogger, type Logger } from "./utils/logger.js";

export interface BeforeRequestEvent<O extends ResolvedOptions = ResolvedOptions> {
  readonly operation: Operation;
  readonly provider: string;
  readonly messages: readonly Message[];
  /** Listeners may replace the options; the provider cannot change. */
  options: O;
}

export interface AfterResponseEvent {
  readonly operation: Operation;
  readonly provider: string;
  readonly model: string;
  /** The response object, absent on failure and for streams. */
  readonly response?: unknown;
  readonly error?: LlmError;
  readonly usage?: UsageStatistics;
  readonly duration_ms: number;
  /** Dispatch attempts made; 0 for a cache hit. */
  readonly attempts: number;
  readonly cached: boolean;
  readonly streamed: boolean;
  /** Set on a stream the consumer stopped before its end. */
  readonly cancelled?: boolean;
}

export interface LlmEventMap {
  before_request: BeforeRequestEvent;
  after_response: AfterResponseEvent;
}

export type LlmEventKind = keyof LlmEventMap;

export type Listener<K extends LlmEventKind> = (event: LlmEventMap[K]) => void;

export class EventBus {
  private _before: Listener<"before_request">[] = [];
  private _after: Listener<"after_response">[] = [];
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /** Subscribe; returns a function that removes the listener. */
  on<K extends LlmEventKind>(kind: K, listener: Listener<K>): () => void {
    const list = this.listeners(kind);
    list.push(listener);
    return () => {
      const index = list.indexOf(listener);
      if (index !== -1) list.splice(index, 1);
    };
  }

  emit<K extends LlmEventKind>(kind: K, event: LlmEventMap[K]): void {
    for (const listener of [...this.listeners(kind)]) {
      try {
        listener(event);
      } catch (err: unknown) {
        this.logger.error(`Event listener for ${kind} failed`, err, {
          provider: event.provider,
          operation: event.operation,
        });
      }
    }
  }

  listenerCount(kind: LlmEventKind): number {
    return this.listeners(kind).length;
  }

  removeAllListeners(): void {
    this._before = [];
    this._after = [];
  }

  private listeners<K extends LlmEventKind>(kind: K): Listener<K>[] {
    // mapped type keeps the kind and its listener type correlated
    const lists: { [P in LlmEventKind]: Listener<P>[] } = {
      before_request: this._before,
      after_response: this._after,
    };
    return lists[kind];
  }
}
