import { EventEmitter } from 'node:events';
import type { SchedulerEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof SchedulerEvents>(event: K, listener: (data: SchedulerEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof SchedulerEvents>(event: K, listener: (data: SchedulerEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof SchedulerEvents>(event: K, listener: (data: SchedulerEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof SchedulerEvents>(event: K, data: SchedulerEvents[K]): void {
    this.emitter.emit(event, data);
  }

  listenerCount(event: keyof SchedulerEvents): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
