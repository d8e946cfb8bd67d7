import type { FrameSource } from '../browser/frameSource.js';
import type { ControlEvent, Viewport } from '../types.js';

export type PageAction =
  | { kind: 'click'; x: number; y: number }
  | { kind: 'type'; text: string }
  | { kind: 'press'; key: string }
  | { kind: 'goto'; url: string }
  | { kind: 'scroll'; deltaY: number };

const SCHEME_PATTERN = /^[a-z][a-z\d+.-]*:\/\//i;

export function withDefaultScheme(url: string, scheme: string): string {
  const trimmed = url.trim();
  return SCHEME_PATTERN.test(trimmed) ? trimmed : `${scheme}://${trimmed}`;
}

export function scaleWheelDelta(deltaY: number, clientHeight: number, viewportHeight: number): number {
  if (!clientHeight) return deltaY;
  return deltaY * (viewportHeight / clientHeight);
}

/** Maps a viewer event onto the page-level action it stands for. */
export function toPageAction(event: ControlEvent, viewport: Viewport, defaultScheme: string): PageAction {
  switch (event.kind) {
    case 'click':
      return {
        kind: 'click',
        x: Math.trunc(event.xRatio * viewport.width),
        y: Math.trunc(event.yRatio * viewport.height),
      };
    case 'key':
      // Code points, so a single emoji is typed rather than pressed.
      return Array.from(event.value).length === 1
        ? { kind: 'type', text: event.value }
        : { kind: 'press', key: event.value };
    case 'navigate':
      return { kind: 'goto', url: withDefaultScheme(event.url, defaultScheme) };
    case 'wheel':
      return {
        kind: 'scroll',
        deltaY: scaleWheelDelta(event.deltaY, event.clientHeight, viewport.height),
      };
  }
}

export async function applyPageAction(source: FrameSource, action: PageAction): Promise<void> {
  switch (action.kind) {
    case 'click':
      await source.click(action.x, action.y);
      return;
    case 'type':
      await source.typeText(action.text);
      return;
    case 'press':
      await source.pressKey(action.key);
      return;
    case 'goto':
      await source.goto(action.url);
      return;
    case 'scroll':
      await source.scrollBy(action.deltaY);
      return;
  }
}
