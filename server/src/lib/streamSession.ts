import { logger } from './logger.js';
import { Broadcaster } from './broadcaster.js';
import { CaptureScheduler, type CaptureSchedulerOptions } from './captureScheduler.js';
import { ClientRegistry } from './clientRegistry.js';
import { EventPipeline } from './eventPipeline.js';
import { PageSources } from './pageSources.js';
import type { FrameSource, FrameSourceLauncher } from '../browser/frameSource.js';
import type { MetaMessage, Viewport } from '../types.js';

export type SessionStatus = 'created' | 'running' | 'degraded' | 'stopped';

export interface StreamSessionOptions extends CaptureSchedulerOptions {
  viewport: Viewport;
  defaultUrlScheme: string;
}

/**
 * Owns the page sources and wires the registry, broadcaster, scheduler and
 * pipeline around them. `degraded` means the primary page never came up:
 * viewers can still connect but see no frames and their input is dropped.
 */
export class StreamSession {
  readonly registry = new ClientRegistry();
  readonly sources: PageSources;
  readonly broadcaster: Broadcaster;
  readonly scheduler: CaptureScheduler;
  readonly pipeline: EventPipeline;
  private launcher: FrameSourceLauncher;
  private current: SessionStatus = 'created';
  private starting: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(launcher: FrameSourceLauncher, options: StreamSessionOptions) {
    this.launcher = launcher;
    this.sources = new PageSources(options.viewport);
    this.broadcaster = new Broadcaster(this.registry);
    this.scheduler = new CaptureScheduler({
      registry: this.registry,
      sources: this.sources,
      broadcaster: this.broadcaster,
      options: {
        fps: options.fps,
        idlePollMs: options.idlePollMs,
        sourceRetryMs: options.sourceRetryMs,
      },
    });
    this.pipeline = new EventPipeline({
      sources: this.sources,
      broadcaster: this.broadcaster,
      defaultScheme: options.defaultUrlScheme,
    });
  }

  get status(): SessionStatus {
    return this.current;
  }

  get streaming(): boolean {
    return this.current === 'running';
  }

  start(): Promise<void> {
    if (!this.starting) {
      this.starting = this.acquire();
    }
    return this.starting;
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.release();
    }
    return this.stopping;
  }

  describe(): MetaMessage {
    const primary = this.sources.primary;
    return {
      type: 'meta',
      viewport: this.sources.viewportOf(primary),
      url: primary ? safeUrl(primary) : '',
    };
  }

  private async acquire(): Promise<void> {
    if (this.launcher.launchMirror) {
      try {
        const mirror = await this.launcher.launchMirror();
        this.sources.mirrors.push(mirror);
        logger.info({ source: mirror.label }, 'mirror_source_ready');
      } catch (err) {
        logger.error({ err }, 'mirror_source_failed');
      }
    }

    try {
      this.sources.primary = await this.launcher.launchPrimary();
      logger.info({ source: this.sources.primary.label }, 'primary_source_ready');
    } catch (err) {
      logger.error({ err }, 'primary_source_failed');
    }

    if (this.stopping) {
      // Stopped mid-launch: release whatever came up.
      await this.closeSources();
      return;
    }

    if (!this.sources.primary) {
      this.current = 'degraded';
      logger.warn('streaming_disabled');
      return;
    }

    this.current = 'running';
    this.scheduler.start();
  }

  private async release(): Promise<void> {
    await this.scheduler.stop();
    this.current = 'stopped';
    await this.closeSources();
    logger.info('session_stopped');
  }

  private async closeSources(): Promise<void> {
    const sources = this.sources.all();
    this.sources.clear();
    for (const source of sources) {
      await closeSource(source);
    }
  }
}

async function closeSource(source: FrameSource): Promise<void> {
  try {
    await source.close();
  } catch (err) {
    logger.error({ err, source: source.label }, 'source_release_failed');
  }
}

function safeUrl(source: FrameSource): string {
  try {
    return source.currentUrl();
  } catch (err) {
    logger.warn({ err, source: source.label }, 'source_url_unavailable');
    return '';
  }
}
