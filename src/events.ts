/**
 * sqlgate Event System
 *
 * The adapters emit `connected` and `closed`. GatewayLogger emits the rest:
 * `transaction` and `slow-transaction` per finished request, `item-failed`,
 * `auth-failed`, and `error` for failures before any item ran. Payload shapes
 * are fixed by GatewayEvents in types.ts.
 */

import { EventEmitter } from 'events';
import type { GatewayEvents } from './types.js';

export type GatewayEventName = keyof GatewayEvents;

export type GatewayListener<E extends GatewayEventName> = (payload: GatewayEvents[E]) => void;

export class GatewayEventEmitter extends EventEmitter {
  on<E extends GatewayEventName>(event: E, listener: GatewayListener<E>): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }

  once<E extends GatewayEventName>(event: E, listener: GatewayListener<E>): this {
    return super.once(event, listener as (...args: unknown[]) => void);
  }

  off<E extends GatewayEventName>(event: E, listener: GatewayListener<E>): this {
    return super.off(event, listener as (...args: unknown[]) => void);
  }

  emit<E extends GatewayEventName>(event: E, payload: GatewayEvents[E]): boolean {
    return super.emit(event, payload);
  }
}
