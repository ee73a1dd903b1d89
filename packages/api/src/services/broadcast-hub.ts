import { randomUUID } from 'node:crypto';
import type { BroadcastEnvelope, ConnectionRecord, ConnectionScope, ScopeFilter } from '@emberline/core';
import type { Logger } from '../utils/logger.js';

/** Outbound side of one realtime client. `send` settles once the frame is handed off. */
export interface ClientChannel {
  send(frame: string): Promise<void>;
  close(code?: number, reason?: string): void;
}

export interface ConnectionStats {
  connectionId: string;
  scope: ConnectionScope;
  connectedAt: Date;
  queued: number;
  delivered: number;
  backpressure: number;
}

export interface HubStats {
  connections: number;
  broadcasts: number;
  delivered: number;
  backpressure: number;
}

interface Connection {
  record: ConnectionRecord;
  channel: ClientChannel;
  queue: string[];
  pumping: boolean;
  closed: boolean;
  delivered: number;
  backpressure: number;
}

export interface BroadcastHubConfig {
  /** Frames buffered per connection before the oldest is dropped. */
  queueDepth: number;
  logger: Logger;
}

export function serializeEnvelope(envelope: BroadcastEnvelope): string {
  return JSON.stringify({ event: envelope.eventType, data: envelope.payload, timestamp: envelope.timestamp });
}

function fieldMatches(scoped: string | undefined, owner: string | null | undefined): boolean {
  if (scoped === undefined || owner === undefined) return true;
  return scoped === owner;
}

/**
 * A connection scoped to a field only receives envelopes owned by the same
 * value. A `null` owner (an unplaced sensor, a gateway spanning tenants) only
 * reaches connections that leave the field open; an omitted field is not checked.
 */
export function scopeMatches(scope: ConnectionScope, filter?: ScopeFilter): boolean {
  if (!filter) return true;
  return fieldMatches(scope.tenantId, filter.tenantId) && fieldMatches(scope.houseId, filter.houseId);
}

/**
 * Live connection registry with per-connection bounded queues. Broadcasting
 * only enqueues; each connection drains on its own, so a stalled client
 * loses its oldest frames instead of holding up the others.
 */
export class BroadcastHub {
  private connections = new Map<string, Connection>();
  private queueDepth: number;
  private log: Logger;
  private totals = { broadcasts: 0, delivered: 0, backpressure: 0 };

  constructor(config: BroadcastHubConfig) {
    this.queueDepth = config.queueDepth;
    this.log = config.logger;
  }

  connect(scope: ConnectionScope, channel: ClientChannel): string {
    const connectionId = randomUUID();
    this.connections.set(connectionId, {
      record: { connectionId, scope: { ...scope }, connectedAt: new Date() },
      channel,
      queue: [],
      pumping: false,
      closed: false,
      delivered: 0,
      backpressure: 0,
    });
    this.log.debug({ connectionId, scope }, 'Realtime client connected');
    return connectionId;
  }

  /** Replace a connection's subscription scope. Returns false for unknown ids. */
  setScope(connectionId: string, scope: ConnectionScope): boolean {
    const conn = this.connections.get(connectionId);
    if (!conn) return false;
    conn.record = { ...conn.record, scope: { ...scope } };
    return true;
  }

  /** Idempotent; unknown ids are ignored. */
  disconnect(connectionId: string): boolean {
    const conn = this.connections.get(connectionId);
    if (!conn) return false;

    this.connections.delete(connectionId);
    conn.closed = true;
    conn.queue.length = 0;
    try {
      conn.channel.close();
    } catch (err) {
      this.log.debug({ err, connectionId }, 'Channel close failed');
    }
    this.log.debug({ connectionId, delivered: conn.delivered, backpressure: conn.backpressure }, 'Realtime client disconnected');
    return true;
  }

  /** Enqueue the envelope for every matching connection; returns how many matched. */
  broadcast(envelope: BroadcastEnvelope, filter?: ScopeFilter): number {
    const frame = serializeEnvelope(envelope);
    const snapshot = [...this.connections.values()];
    let matched = 0;

    this.totals.broadcasts++;
    for (const conn of snapshot) {
      if (conn.closed || !scopeMatches(conn.record.scope, filter)) continue;
      this.enqueue(conn, frame);
      matched++;
    }
    return matched;
  }

  async shutdown(): Promise<void> {
    const ids = [...this.connections.keys()];
    for (const id of ids) {
      this.disconnect(id);
    }
    this.log.info({ closed: ids.length }, 'Broadcast hub shut down');
  }

  getConnectionStats(connectionId: string): ConnectionStats | null {
    const conn = this.connections.get(connectionId);
    if (!conn) return null;
    return {
      connectionId,
      scope: { ...conn.record.scope },
      connectedAt: conn.record.connectedAt,
      queued: conn.queue.length,
      delivered: conn.delivered,
      backpressure: conn.backpressure,
    };
  }

  getStats(): HubStats {
    return {
      connections: this.connections.size,
      broadcasts: this.totals.broadcasts,
      delivered: this.totals.delivered,
      backpressure: this.totals.backpressure,
    };
  }

  listConnections(): ConnectionRecord[] {
    return [...this.connections.values()].map((c) => ({ ...c.record }));
  }

  private enqueue(conn: Connection, frame: string): void {
    if (conn.queue.length >= this.queueDepth) {
      conn.queue.shift();
      conn.backpressure++;
      this.totals.backpressure++;
    }
    conn.queue.push(frame);

    if (!conn.pumping) {
      conn.pumping = true;
      void this.pump(conn);
    }
  }

  private async pump(conn: Connection): Promise<void> {
    try {
      while (!conn.closed) {
        const frame = conn.queue.shift();
        if (frame === undefined) break;
        await conn.channel.send(frame);
        conn.delivered++;
        this.totals.delivered++;
      }
    } catch (err) {
      this.log.warn({ err, connectionId: conn.record.connectionId }, 'Realtime send failed, dropping connection');
      this.disconnect(conn.record.connectionId);
    } finally {
      conn.pumping = false;
    }
  }
}
