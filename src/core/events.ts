import { EventEmitter } from 'eventemitter3';
import type { HubEvents } from './types.js';

/**
 * Typed pub/sub over eventemitter3. The event map defaults to the hub-side
 * events; the client transport instantiates it with the push-event map.
 */
export class EventBus<Events extends object = HubEvents> {
  private emitter = new EventEmitter();

  on<K extends keyof Events & string>(event: K, listener: (data: Events[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof Events & string>(event: K, listener: (data: Events[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof Events & string>(event: K, listener: (data: Events[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof Events & string>(event: K, data: Events[K]): void {
    this.emitter.emit(event, data);
  }

  listenerCount<K extends keyof Events & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
