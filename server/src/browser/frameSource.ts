import type { Viewport } from '../types.js';

export interface CapturedImage {
  image: Buffer;
  mime: string;
}

/** A live page that can be snapshotted and driven with input. */
export interface FrameSource {
  readonly label: string;
  capture(): Promise<CapturedImage>;
  viewportSize(): Viewport | null;
  currentUrl(): string;
  click(x: number, y: number): Promise<void>;
  typeText(text: string): Promise<void>;
  pressKey(key: string): Promise<void>;
  goto(url: string): Promise<void>;
  scrollBy(deltaY: number): Promise<void>;
  close(): Promise<void>;
}

export interface FrameSourceLauncher {
  launchPrimary(): Promise<FrameSource>;
  /** Absent when no operator mirror is configured. */
  launchMirror?: () => Promise<FrameSource>;
}
