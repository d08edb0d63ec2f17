import { EventEmitter } from 'eventemitter3';
import type { EngineEvents } from './types.js';

export type EngineEventName = keyof EngineEvents;
export type EngineListener<K extends EngineEventName> = (data: EngineEvents[K]) => void;

/**
 * Typed engine lifecycle notifications over eventemitter3.
 * Listeners run synchronously inside emit(); a throwing listener propagates
 * to whatever emitted, so keep them cheap.
 */
export class EventBus {
  private readonly emitter = new EventEmitter();

  /** Subscribe; the returned function removes this listener again */
  on<K extends EngineEventName>(event: K, listener: EngineListener<K>): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  off<K extends EngineEventName>(event: K, listener: EngineListener<K>): void {
    this.emitter.off(event, listener);
  }

  once<K extends EngineEventName>(event: K, listener: EngineListener<K>): void {
    this.emitter.once(event, listener);
  }

  emit<K extends EngineEventName>(event: K, data: EngineEvents[K]): void {
    this.emitter.emit(event, data);
  }

  listenerCount(event: EngineEventName): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
