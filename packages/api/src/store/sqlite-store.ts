/**
 * SQLite-backed pipeline store.
 *
 * Uses better-sqlite3 (synchronous, in-process) with WAL mode. Timestamps are
 * stored as ISO-8601 text, booleans as 0/1. Pass ':memory:' for an ephemeral
 * database.
 */

import Database from 'better-sqlite3';
import { OPEN_INCIDENT_STATES } from '@emberline/core';
import type {
  AlarmIncident,
  AttemptResult,
  DeliveryAuditEntry,
  DeviceKind,
  DeviceState,
  DeviceStatus,
  FailureReason,
  GeoPoint,
  IncidentState,
  NotificationChannel,
  NotificationTier,
  Recipient,
  RecipientRole,
  SensorPlacement,
  SensorType,
  Severity,
  TaskRecord,
  TaskStatus,
} from '@emberline/core';
import { boundingBox, haversineDistance } from '../utils/geo.js';
import type { PipelineStore, RecipientMatch } from './types.js';

interface DeviceRow {
  id: string;
  kind: DeviceKind;
  gateway_id: string | null;
  status: DeviceStatus;
  battery_level: number | null;
  signal_strength: number | null;
  last_heartbeat_at: string | null;
  last_event_at: string | null;
  firmware_version: string | null;
  hardware_version: string | null;
  sensor_type: SensorType | null;
  registered: number;
  last_self_test_at: string | null;
  self_test_passed: number | null;
  updated_at: string;
}

interface IncidentRow {
  id: string;
  sensor_id: string;
  gateway_id: string | null;
  house_id: string | null;
  tenant_id: string | null;
  severity: Severity;
  state: IncidentState;
  triggered_at: string;
  trigger_count: number;
  acknowledged_by: string | null;
  acknowledged_at: string | null;
  escalated_at: string | null;
  resolved_at: string | null;
  resolved_by: string | null;
}

interface PlacementRow {
  sensor_id: string;
  house_id: string;
  tenant_id: string;
  latitude: number;
  longitude: number;
}

interface RecipientRow {
  id: string;
  house_id: string | null;
  tenant_id: string | null;
  role: RecipientRole;
  latitude: number;
  longitude: number;
  push_token: string | null;
  phone: string | null;
  email: string | null;
}

interface TaskRow {
  id: string;
  recipient_id: string;
  incident_id: string;
  channel: NotificationChannel;
  address: string | null;
  tier: NotificationTier;
  title: string;
  body: string;
  status: TaskStatus;
  attempts: number;
  last_error: string | null;
  failure_reason: FailureReason | null;
  created_at: string;
  updated_at: string;
}

interface AuditRow {
  recipient_id: string;
  incident_id: string;
  task_id: string;
  attempt: number;
  result: AttemptResult;
  error: string | null;
  at: string;
}

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

function date(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

function flag(value: boolean | null): number | null {
  return value === null ? null : value ? 1 : 0;
}

function toDeviceState(row: DeviceRow): DeviceState {
  return {
    id: row.id,
    kind: row.kind,
    gatewayId: row.gateway_id,
    status: row.status,
    batteryLevel: row.battery_level,
    signalStrength: row.signal_strength,
    lastHeartbeatAt: date(row.last_heartbeat_at),
    lastEventAt: date(row.last_event_at),
    firmwareVersion: row.firmware_version,
    hardwareVersion: row.hardware_version,
    sensorType: row.sensor_type,
    registered: row.registered === 1,
    lastSelfTestAt: date(row.last_self_test_at),
    selfTestPassed: row.self_test_passed === null ? null : row.self_test_passed === 1,
    updatedAt: new Date(row.updated_at),
  };
}

function toIncident(row: IncidentRow): AlarmIncident {
  return {
    id: row.id,
    sensorId: row.sensor_id,
    gatewayId: row.gateway_id,
    houseId: row.house_id,
    tenantId: row.tenant_id,
    severity: row.severity,
    state: row.state,
    triggeredAt: new Date(row.triggered_at),
    triggerCount: row.trigger_count,
    acknowledgedBy: row.acknowledged_by,
    acknowledgedAt: date(row.acknowledged_at),
    escalatedAt: date(row.escalated_at),
    resolvedAt: date(row.resolved_at),
    resolvedBy: row.resolved_by,
  };
}

function toRecipient(row: RecipientRow): Recipient {
  return {
    id: row.id,
    houseId: row.house_id,
    tenantId: row.tenant_id,
    role: row.role,
    location: { latitude: row.latitude, longitude: row.longitude },
    pushToken: row.push_token,
    phone: row.phone,
    email: row.email,
  };
}

function toTask(row: TaskRow): TaskRecord {
  return {
    id: row.id,
    recipientId: row.recipient_id,
    incidentId: row.incident_id,
    channel: row.channel,
    address: row.address,
    tier: row.tier,
    title: row.title,
    body: row.body,
    status: row.status,
    attempts: row.attempts,
    lastError: row.last_error,
    failureReason: row.failure_reason,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function toAudit(row: AuditRow): DeliveryAuditEntry {
  return {
    recipientId: row.recipient_id,
    incidentId: row.incident_id,
    taskId: row.task_id,
    attempt: row.attempt,
    result: row.result,
    error: row.error,
    at: new Date(row.at),
  };
}

export class SqliteStore implements PipelineStore {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.ensureTables();
  }

  private ensureTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS device_states (
        id TEXT PRIMARY KEY,
        kind TEXT NOT NULL CHECK (kind IN ('gateway', 'sensor')),
        gateway_id TEXT,
        status TEXT NOT NULL,
        battery_level REAL,
        signal_strength REAL,
        last_heartbeat_at TEXT,
        last_event_at TEXT,
        firmware_version TEXT,
        hardware_version TEXT,
        sensor_type TEXT,
        registered INTEGER NOT NULL DEFAULT 0,
        last_self_test_at TEXT,
        self_test_passed INTEGER,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS incidents (
        id TEXT PRIMARY KEY,
        sensor_id TEXT NOT NULL,
        gateway_id TEXT,
        house_id TEXT,
        tenant_id TEXT,
        severity TEXT NOT NULL,
        state TEXT NOT NULL,
        triggered_at TEXT NOT NULL,
        trigger_count INTEGER NOT NULL DEFAULT 1,
        acknowledged_by TEXT,
        acknowledged_at TEXT,
        escalated_at TEXT,
        resolved_at TEXT,
        resolved_by TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_incidents_sensor_state ON incidents(sensor_id, state);

      CREATE TABLE IF NOT EXISTS sensor_placements (
        sensor_id TEXT PRIMARY KEY,
        house_id TEXT NOT NULL,
        tenant_id TEXT NOT NULL,
        latitude REAL NOT NULL,
        longitude REAL NOT NULL
      );

      CREATE TABLE IF NOT EXISTS recipients (
        id TEXT PRIMARY KEY,
        house_id TEXT,
        tenant_id TEXT,
        role TEXT NOT NULL CHECK (role IN ('occupant', 'emergency')),
        latitude REAL NOT NULL,
        longitude REAL NOT NULL,
        push_token TEXT,
        phone TEXT,
        email TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_recipients_location ON recipients(latitude, longitude);
      CREATE INDEX IF NOT EXISTS idx_recipients_house ON recipients(house_id);

      CREATE TABLE IF NOT EXISTS notification_tasks (
        id TEXT PRIMARY KEY,
        recipient_id TEXT NOT NULL,
        incident_id TEXT NOT NULL,
        channel TEXT NOT NULL,
        address TEXT,
        tier TEXT NOT NULL,
        title TEXT NOT NULL,
        body TEXT NOT NULL,
        status TEXT NOT NULL CHECK (status IN ('pending', 'sent', 'failed', 'cancelled')),
        attempts INTEGER NOT NULL DEFAULT 0,
        last_error TEXT,
        failure_reason TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_tasks_incident ON notification_tasks(incident_id);
      CREATE INDEX IF NOT EXISTS idx_tasks_status ON notification_tasks(status);

      CREATE TABLE IF NOT EXISTS delivery_audit (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        recipient_id TEXT NOT NULL,
        incident_id TEXT NOT NULL,
        task_id TEXT NOT NULL,
        attempt INTEGER NOT NULL,
        result TEXT NOT NULL,
        error TEXT,
        at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_audit_key ON delivery_audit(recipient_id, incident_id);
    `);
  }

  // ---------------------------------------------------------------------------
  // Device state
  // ---------------------------------------------------------------------------

  async getDeviceState(id: string): Promise<DeviceState | null> {
    const row = this.db.prepare<[string], DeviceRow>('SELECT * FROM device_states WHERE id = ?').get(id);
    return row ? toDeviceState(row) : null;
  }

  async saveDeviceState(state: DeviceState): Promise<void> {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO device_states (
          id, kind, gateway_id, status, battery_level, signal_strength, last_heartbeat_at, last_event_at,
          firmware_version, hardware_version, sensor_type, registered, last_self_test_at, self_test_passed, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        state.id,
        state.kind,
        state.gatewayId,
        state.status,
        state.batteryLevel,
        state.signalStrength,
        iso(state.lastHeartbeatAt),
        iso(state.lastEventAt),
        state.firmwareVersion,
        state.hardwareVersion,
        state.sensorType,
        state.registered ? 1 : 0,
        iso(state.lastSelfTestAt),
        flag(state.selfTestPassed),
        state.updatedAt.toISOString(),
      );
  }

  async listDeviceStates(): Promise<DeviceState[]> {
    return this.db.prepare<[], DeviceRow>('SELECT * FROM device_states ORDER BY id ASC').all().map(toDeviceState);
  }

  // ---------------------------------------------------------------------------
  // Incidents
  // ---------------------------------------------------------------------------

  async getIncident(id: string): Promise<AlarmIncident | null> {
    const row = this.db.prepare<[string], IncidentRow>('SELECT * FROM incidents WHERE id = ?').get(id);
    return row ? toIncident(row) : null;
  }

  async saveIncident(incident: AlarmIncident): Promise<void> {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO incidents (
          id, sensor_id, gateway_id, house_id, tenant_id, severity, state, triggered_at, trigger_count,
          acknowledged_by, acknowledged_at, escalated_at, resolved_at, resolved_by
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        incident.id,
        incident.sensorId,
        incident.gatewayId,
        incident.houseId,
        incident.tenantId,
        incident.severity,
        incident.state,
        incident.triggeredAt.toISOString(),
        incident.triggerCount,
        incident.acknowledgedBy,
        iso(incident.acknowledgedAt),
        iso(incident.escalatedAt),
        iso(incident.resolvedAt),
        incident.resolvedBy,
      );
  }

  async findOpenIncidentForSensor(sensorId: string): Promise<AlarmIncident | null> {
    const placeholders = OPEN_INCIDENT_STATES.map(() => '?').join(', ');
    const row = this.db
      .prepare<string[], IncidentRow>(
        `SELECT * FROM incidents WHERE sensor_id = ? AND state IN (${placeholders})
         ORDER BY triggered_at DESC LIMIT 1`,
      )
      .get(sensorId, ...OPEN_INCIDENT_STATES);
    return row ? toIncident(row) : null;
  }

  async listIncidents(state?: IncidentState): Promise<AlarmIncident[]> {
    if (state) {
      return this.db
        .prepare<[string], IncidentRow>('SELECT * FROM incidents WHERE state = ? ORDER BY triggered_at DESC, id ASC')
        .all(state)
        .map(toIncident);
    }
    return this.db
      .prepare<[], IncidentRow>('SELECT * FROM incidents ORDER BY triggered_at DESC, id ASC')
      .all()
      .map(toIncident);
  }

  // ---------------------------------------------------------------------------
  // Directory
  // ---------------------------------------------------------------------------

  async getSensorPlacement(sensorId: string): Promise<SensorPlacement | null> {
    const row = this.db.prepare<[string], PlacementRow>('SELECT * FROM sensor_placements WHERE sensor_id = ?').get(sensorId);
    if (!row) return null;
    return {
      sensorId: row.sensor_id,
      houseId: row.house_id,
      tenantId: row.tenant_id,
      location: { latitude: row.latitude, longitude: row.longitude },
    };
  }

  async upsertSensorPlacement(placement: SensorPlacement): Promise<void> {
    this.db
      .prepare('INSERT OR REPLACE INTO sensor_placements (sensor_id, house_id, tenant_id, latitude, longitude) VALUES (?, ?, ?, ?, ?)')
      .run(placement.sensorId, placement.houseId, placement.tenantId, placement.location.latitude, placement.location.longitude);
  }

  async upsertRecipient(recipient: Recipient): Promise<void> {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO recipients (id, house_id, tenant_id, role, latitude, longitude, push_token, phone, email)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        recipient.id,
        recipient.houseId,
        recipient.tenantId,
        recipient.role,
        recipient.location.latitude,
        recipient.location.longitude,
        recipient.pushToken,
        recipient.phone,
        recipient.email,
      );
  }

  /** Bounding-box prefilter on the index, exact haversine check in JS. */
  async findWithinRadius(point: GeoPoint, radiusMeters: number): Promise<RecipientMatch[]> {
    const box = boundingBox(point, radiusMeters);
    const lonClause = box.lonRanges.map(() => 'longitude BETWEEN ? AND ?').join(' OR ');
    const rows = this.db
      .prepare<number[], RecipientRow>(
        `SELECT * FROM recipients
         WHERE latitude BETWEEN ? AND ? AND (${lonClause})`,
      )
      .all(box.minLat, box.maxLat, ...box.lonRanges.flat());

    const matches: RecipientMatch[] = [];
    for (const row of rows) {
      const recipient = toRecipient(row);
      const distanceMeters = haversineDistance(point, recipient.location);
      if (distanceMeters <= radiusMeters) {
        matches.push({ recipient, distanceMeters });
      }
    }
    return matches.sort((a, b) => a.distanceMeters - b.distanceMeters || a.recipient.id.localeCompare(b.recipient.id));
  }

  async findRecipientsByHouse(houseId: string): Promise<Recipient[]> {
    return this.db
      .prepare<[string], RecipientRow>('SELECT * FROM recipients WHERE house_id = ? ORDER BY id ASC')
      .all(houseId)
      .map(toRecipient);
  }

  // ---------------------------------------------------------------------------
  // Notification tasks
  // ---------------------------------------------------------------------------

  async saveTask(task: TaskRecord): Promise<void> {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO notification_tasks (
          id, recipient_id, incident_id, channel, address, tier, title, body, status, attempts,
          last_error, failure_reason, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        task.id,
        task.recipientId,
        task.incidentId,
        task.channel,
        task.address,
        task.tier,
        task.title,
        task.body,
        task.status,
        task.attempts,
        task.lastError,
        task.failureReason,
        task.createdAt.toISOString(),
        task.updatedAt.toISOString(),
      );
  }

  async getTask(id: string): Promise<TaskRecord | null> {
    const row = this.db.prepare<[string], TaskRow>('SELECT * FROM notification_tasks WHERE id = ?').get(id);
    return row ? toTask(row) : null;
  }

  async listTasksForIncident(incidentId: string, tier?: NotificationTier): Promise<TaskRecord[]> {
    if (tier) {
      return this.db
        .prepare<[string, string], TaskRow>(
          'SELECT * FROM notification_tasks WHERE incident_id = ? AND tier = ? ORDER BY recipient_id ASC, id ASC',
        )
        .all(incidentId, tier)
        .map(toTask);
    }
    return this.db
      .prepare<[string], TaskRow>('SELECT * FROM notification_tasks WHERE incident_id = ? ORDER BY recipient_id ASC, id ASC')
      .all(incidentId)
      .map(toTask);
  }

  async listFailedTasks(): Promise<TaskRecord[]> {
    return this.db
      .prepare<[], TaskRow>("SELECT * FROM notification_tasks WHERE status = 'failed' ORDER BY updated_at ASC, id ASC")
      .all()
      .map(toTask);
  }

  // ---------------------------------------------------------------------------
  // Delivery audit
  // ---------------------------------------------------------------------------

  async appendAudit(entry: DeliveryAuditEntry): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO delivery_audit (recipient_id, incident_id, task_id, attempt, result, error, at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(entry.recipientId, entry.incidentId, entry.taskId, entry.attempt, entry.result, entry.error, entry.at.toISOString());
  }

  async listAudit(filter: { recipientId?: string; incidentId?: string } = {}): Promise<DeliveryAuditEntry[]> {
    const clauses: string[] = [];
    const params: string[] = [];
    if (filter.recipientId) {
      clauses.push('recipient_id = ?');
      params.push(filter.recipientId);
    }
    if (filter.incidentId) {
      clauses.push('incident_id = ?');
      params.push(filter.incidentId);
    }
    const where = clauses.length ? `WHERE ${clauses.join(' AND ')}` : '';
    return this.db
      .prepare<string[], AuditRow>(`SELECT * FROM delivery_audit ${where} ORDER BY seq ASC`)
      .all(...params)
      .map(toAudit);
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
