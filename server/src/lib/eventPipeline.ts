import { logger } from './logger.js';
import { applyPageAction, toPageAction, type PageAction } from './controlActions.js';
import type { Broadcaster } from './broadcaster.js';
import type { PageSources } from './pageSources.js';
import type { FrameSource } from '../browser/frameSource.js';
import type { ControlEvent } from '../types.js';

export type EventOutcome = 'applied' | 'skipped' | 'failed';

/**
 * Applies viewer input to the shared page one event at a time.
 *
 * Submissions return immediately and are chained onto a single promise, so
 * at most one event touches the page at any instant. Links never reject.
 */
export class EventPipeline {
  private sources: PageSources;
  private broadcaster: Broadcaster;
  private defaultScheme: string;
  private chain: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(params: { sources: PageSources; broadcaster: Broadcaster; defaultScheme: string }) {
    this.sources = params.sources;
    this.broadcaster = params.broadcaster;
    this.defaultScheme = params.defaultScheme;
  }

  get queued(): number {
    return this.pending;
  }

  submit(event: ControlEvent, clientId?: string): void {
    this.pending += 1;
    this.chain = this.chain.then(async () => {
      try {
        const outcome = await this.process(event);
        logger.debug({ event: event.kind, clientId, outcome }, 'event_processed');
      } catch (err) {
        logger.error({ err, event: event.kind, clientId }, 'event_pipeline_failed');
      } finally {
        this.pending -= 1;
      }
    });
  }

  /** Resolves once everything submitted so far has been processed. */
  drain(): Promise<void> {
    return this.chain;
  }

  private async process(event: ControlEvent): Promise<EventOutcome> {
    const primary = this.sources.primary;
    if (!primary) {
      logger.warn({ event: event.kind }, 'event_skipped_no_source');
      return 'skipped';
    }

    const action = toPageAction(event, this.sources.viewportOf(primary), this.defaultScheme);

    try {
      await applyPageAction(primary, action);
    } catch (err) {
      logger.error({ err, action, source: primary.label }, 'event_apply_failed');
      return 'failed';
    }

    await this.mirror(action);

    try {
      const frame = await this.sources.captureFrame(primary);
      this.broadcaster.broadcast(frame);
    } catch (err) {
      logger.error({ err }, 'event_frame_failed');
      return 'failed';
    }
    return 'applied';
  }

  private async mirror(action: PageAction): Promise<void> {
    for (const mirror of this.sources.mirrors) {
      await applyMirrorAction(mirror, action);
    }
  }
}

async function applyMirrorAction(mirror: FrameSource, action: PageAction): Promise<void> {
  try {
    await applyPageAction(mirror, action);
  } catch (err) {
    logger.warn({ err, action, source: mirror.label }, 'mirror_apply_failed');
  }
}
