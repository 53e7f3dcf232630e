/**
 * RuleDB Event System — Typed event emitter
 *
 * Lifecycle, statement, pass and error events flow through this.
 */

import { EventEmitter } from 'events';
import type { RuleDBEvents } from './types.js';

export class RuleDBEventEmitter extends EventEmitter {
  on<E extends keyof RuleDBEvents>(
    event: E,
    listener: (payload: RuleDBEvents[E]) => void,
  ): this {
    return super.on(event, listener);
  }

  once<E extends keyof RuleDBEvents>(
    event: E,
    listener: (payload: RuleDBEvents[E]) => void,
  ): this {
    return super.once(event, listener);
  }

  emit<E extends keyof RuleDBEvents>(
    event: E,
    payload: RuleDBEvents[E],
  ): boolean {
    return super.emit(event, payload);
  }

  off<E extends keyof RuleDBEvents>(
    event: E,
    listener: (payload: RuleDBEvents[E]) => void,
  ): this {
    return super.off(event, listener);
  }
}
