import type { FrameSource } from '../browser/frameSource.js';
import type { Frame, Viewport } from '../types.js';

/** The primary page every viewer sees, plus mirrors that replay the same input. */
export class PageSources {
  primary: FrameSource | null = null;
  mirrors: FrameSource[] = [];
  readonly fallbackViewport: Viewport;

  constructor(fallbackViewport: Viewport) {
    this.fallbackViewport = fallbackViewport;
  }

  viewportOf(source: FrameSource | null): Viewport {
    return source?.viewportSize() ?? this.fallbackViewport;
  }

  all(): FrameSource[] {
    return this.primary ? [...this.mirrors, this.primary] : [...this.mirrors];
  }

  clear(): void {
    this.primary = null;
    this.mirrors = [];
  }

  async captureFrame(source: FrameSource): Promise<Frame> {
    const { image, mime } = await source.capture();
    const { width, height } = this.viewportOf(source);
    return { image, mime, width, height };
  }
}
