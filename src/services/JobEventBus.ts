import { EventEmitter } from 'node:events';
import type { JobStreamEvent } from '../domain/entities/JobEvent.js';

type JobListener = (event: JobStreamEvent) => void;

/**
 * Per-job broadcast of stream events. Every listener receives every event
 * published after it subscribed, in publish order.
 */
export class JobEventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  onJob(jobId: string, listener: JobListener): void {
    this.emitter.on(this.channel(jobId), listener);
  }

  offJob(jobId: string, listener: JobListener): void {
    this.emitter.off(this.channel(jobId), listener);
  }

  emitJob(event: JobStreamEvent): void {
    this.emitter.emit(this.channel(event.jobId), event);
  }

  listenerCount(jobId: string): number {
    return this.emitter.listenerCount(this.channel(jobId));
  }

  private channel(jobId: string): string {
    return `job:${jobId}`;
  }
}
