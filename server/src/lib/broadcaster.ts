import { logger } from './logger.js';
import type { ClientRegistry } from './clientRegistry.js';
import type { BroadcastResult, ClientConnection, Frame, FrameMessage } from '../types.js';

export type FrameEncoder = (frame: Frame) => string;

export const encodeFrame: FrameEncoder = (frame) => {
  const message: FrameMessage = {
    type: 'frame',
    image: frame.image.toString('base64'),
    width: frame.width,
    height: frame.height,
  };
  return JSON.stringify(message);
};

/**
 * Fans one encoded frame out to every registered viewer. Sends are handed to
 * each transport and never awaited, so a slow link only drops its own frames.
 */
export class Broadcaster {
  private registry: ClientRegistry;
  private encode: FrameEncoder;

  constructor(registry: ClientRegistry, encode: FrameEncoder = encodeFrame) {
    this.registry = registry;
    this.encode = encode;
  }

  broadcast(frame: Frame): BroadcastResult {
    const payload = this.encode(frame);
    const clients = this.registry.snapshotAll();

    let delivered = 0;
    let skipped = 0;
    let pruned = 0;
    for (const client of clients) {
      try {
        if (client.send(payload) === 'skipped') {
          skipped += 1;
        } else {
          delivered += 1;
        }
      } catch (err) {
        logger.warn({ err, clientId: client.id }, 'frame_delivery_failed');
        if (this.registry.remove(client)) pruned += 1;
        closeClient(client);
      }
    }

    if (skipped > 0) {
      logger.debug({ skipped }, 'frame_skipped_backpressure');
    }
    return { attempted: clients.length, delivered, skipped, pruned };
  }
}

function closeClient(client: ClientConnection): void {
  try {
    client.close();
  } catch (err) {
    logger.warn({ err, clientId: client.id }, 'client_close_failed');
  }
}
