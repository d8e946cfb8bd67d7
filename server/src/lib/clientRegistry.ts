import type { ClientConnection } from '../types.js';

/**
 * Live viewer connections. Every caller runs on the same event loop, so a
 * plain Set is enough; `snapshotAll` hands out a copy so fan-out can iterate
 * while connections come and go.
 */
export class ClientRegistry {
  private clients = new Set<ClientConnection>();

  add(client: ClientConnection): void {
    this.clients.add(client);
  }

  remove(client: ClientConnection): boolean {
    return this.clients.delete(client);
  }

  has(client: ClientConnection): boolean {
    return this.clients.has(client);
  }

  snapshotAll(): ClientConnection[] {
    return Array.from(this.clients);
  }

  get size(): number {
    return this.clients.size;
  }
}
