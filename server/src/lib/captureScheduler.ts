import { logger } from './logger.js';
import type { Broadcaster } from './broadcaster.js';
import type { ClientRegistry } from './clientRegistry.js';
import type { PageSources } from './pageSources.js';

export interface CaptureSchedulerOptions {
  fps: number;
  idlePollMs: number;
  sourceRetryMs: number;
}

export type CaptureSchedulerState = 'idle' | 'active' | 'stopped';

/**
 * Fixed-rate capture loop. Captures only while at least one viewer is
 * registered and never faster than the configured frame rate.
 */
export class CaptureScheduler {
  private registry: ClientRegistry;
  private sources: PageSources;
  private broadcaster: Broadcaster;
  private options: CaptureSchedulerOptions;
  private running = false;
  private stopped = false;
  private timer: NodeJS.Timeout | null = null;
  private inflight: Promise<void> | null = null;
  private phase: CaptureSchedulerState = 'idle';

  constructor(params: {
    registry: ClientRegistry;
    sources: PageSources;
    broadcaster: Broadcaster;
    options: CaptureSchedulerOptions;
  }) {
    this.registry = params.registry;
    this.sources = params.sources;
    this.broadcaster = params.broadcaster;
    this.options = params.options;
  }

  get frameIntervalMs(): number {
    return 1000 / Math.max(1, this.options.fps);
  }

  get state(): CaptureSchedulerState {
    return this.phase;
  }

  start(): void {
    if (this.running || this.stopped) return;
    this.running = true;
    logger.info({ fps: this.options.fps }, 'capture_loop_started');
    this.schedule(0);
  }

  async stop(): Promise<void> {
    this.running = false;
    this.stopped = true;
    this.phase = 'stopped';
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inflight) {
      await this.inflight;
    }
  }

  private schedule(delayMs: number): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inflight = this.tick().finally(() => {
        this.inflight = null;
      });
    }, delayMs);
  }

  private async tick(): Promise<void> {
    if (this.registry.size === 0) {
      this.phase = 'idle';
      this.schedule(this.options.idlePollMs);
      return;
    }

    this.phase = 'active';
    const source = this.sources.primary;
    if (!source) {
      logger.warn('capture_source_unavailable');
      this.schedule(this.options.sourceRetryMs);
      return;
    }

    try {
      const frame = await this.sources.captureFrame(source);
      this.broadcaster.broadcast(frame);
    } catch (err) {
      logger.error({ err }, 'capture_failed');
    }

    if (!this.running) {
      this.phase = 'stopped';
      return;
    }
    this.schedule(this.frameIntervalMs);
  }
}
