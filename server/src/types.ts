export interface Viewport {
  width: number;
  height: number;
}

export interface Frame {
  image: Buffer;
  mime: string;
  width: number;
  height: number;
}

export type ControlEvent =
  | { kind: 'click'; xRatio: number; yRatio: number }
  | { kind: 'key'; value: string }
  | { kind: 'navigate'; url: string }
  | { kind: 'wheel'; deltaY: number; clientHeight: number };

export type SendStatus = 'queued' | 'skipped';

/**
 * One viewer's duplex channel as seen by the streaming core.
 * `send` hands the payload to the transport without waiting for it to be
 * flushed. It returns `skipped` while the viewer is backed up and throws once
 * the channel can no longer deliver.
 */
export interface ClientConnection {
  readonly id: string;
  send(payload: string): SendStatus;
  close(): void;
}

export interface BroadcastResult {
  attempted: number;
  delivered: number;
  skipped: number;
  pruned: number;
}

export interface MetaMessage {
  type: 'meta';
  viewport: Viewport;
  url: string;
}

export interface FrameMessage {
  type: 'frame';
  image: string;
  width: number;
  height: number;
}

export type ServerMessage = MetaMessage | FrameMessage;
