// Emberline Core Types

// ============================================================================
// Device Types
// ============================================================================

/** Message kinds carried in the third segment of `uplink/{gatewayId}/{kind}`. */
export enum EventKind {
  POWER_ON = 'power_on',
  HEARTBEAT = 'heartbeat',
  SMOKE_ALARM = 'smoke_alarm',
  REGISTRATION = 'smoke_register',
  DELETION_ACK = 'delete_response',
  SELF_TEST = 'self_test',
  LOW_BATTERY = 'low_battery',
}

export enum DeviceStatus {
  ONLINE = 'online',
  OFFLINE = 'offline',
  UNKNOWN = 'unknown',
}

export type DeviceKind = 'gateway' | 'sensor';

export type SensorType = 'smoke' | 'heat' | 'gas';

export interface PowerOnPayload {
  firmwareVersion: string;
  hardwareVersion?: string;
  batteryVoltage?: number;
  signalStrength?: number;
}

export interface HeartbeatPayload {
  sensorId?: string;
  batteryVoltage?: number;
  signalStrength?: number;
}

export interface SmokeAlarmPayload {
  sensorId: string;
  severity: Severity;
  alarmType: SensorType;
}

export interface RegistrationPayload {
  sensorId: string;
  sensorType?: SensorType;
  firmwareVersion?: string;
}

export interface DeletionAckPayload {
  sensorId: string;
  success: boolean;
}

export interface SelfTestPayload {
  sensorId?: string;
  passed: boolean;
}

export interface LowBatteryPayload {
  sensorId?: string;
  batteryVoltage: number;
}

interface EventBase<K extends EventKind, P> {
  readonly sourceId: string;
  readonly kind: K;
  readonly payload: Readonly<P>;
  readonly receivedAt: Date;
}

export type PowerOnEvent = EventBase<EventKind.POWER_ON, PowerOnPayload>;
export type HeartbeatEvent = EventBase<EventKind.HEARTBEAT, HeartbeatPayload>;
export type SmokeAlarmEvent = EventBase<EventKind.SMOKE_ALARM, SmokeAlarmPayload>;
export type RegistrationEvent = EventBase<EventKind.REGISTRATION, RegistrationPayload>;
export type DeletionAckEvent = EventBase<EventKind.DELETION_ACK, DeletionAckPayload>;
export type SelfTestEvent = EventBase<EventKind.SELF_TEST, SelfTestPayload>;
export type LowBatteryEvent = EventBase<EventKind.LOW_BATTERY, LowBatteryPayload>;

export type DeviceEvent =
  | PowerOnEvent
  | HeartbeatEvent
  | SmokeAlarmEvent
  | RegistrationEvent
  | DeletionAckEvent
  | SelfTestEvent
  | LowBatteryEvent;

export interface DeviceState {
  id: string;
  kind: DeviceKind;
  gatewayId: string | null; // sensors only
  status: DeviceStatus;
  batteryLevel: number | null; // volts
  signalStrength: number | null; // dBm
  lastHeartbeatAt: Date | null;
  lastEventAt: Date | null;
  firmwareVersion: string | null;
  hardwareVersion: string | null;
  sensorType: SensorType | null;
  registered: boolean;
  lastSelfTestAt: Date | null;
  selfTestPassed: boolean | null;
  updatedAt: Date;
}

export interface LowBatteryCandidate {
  deviceId: string;
  gatewayId: string | null;
  batteryLevel: number;
  detectedAt: Date;
}

// ============================================================================
// Incident Types
// ============================================================================

export enum Severity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export enum IncidentState {
  ACTIVE = 'active',
  ACKNOWLEDGED = 'acknowledged',
  ESCALATED = 'escalated',
  RESOLVED = 'resolved',
}

export const OPEN_INCIDENT_STATES: readonly IncidentState[] = [
  IncidentState.ACTIVE,
  IncidentState.ACKNOWLEDGED,
  IncidentState.ESCALATED,
];

export interface AlarmIncident {
  id: string;
  sensorId: string;
  gatewayId: string | null;
  houseId: string | null;
  tenantId: string | null;
  severity: Severity;
  state: IncidentState;
  triggeredAt: Date;
  triggerCount: number;
  acknowledgedBy: string | null;
  acknowledgedAt: Date | null;
  escalatedAt: Date | null;
  resolvedAt: Date | null;
  resolvedBy: string | null;
}

export type EscalationReason = 'ack_timeout' | 'manual';

// ============================================================================
// Directory Types (read by the router)
// ============================================================================

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface SensorPlacement {
  sensorId: string;
  houseId: string;
  tenantId: string;
  location: GeoPoint;
}

export type RecipientRole = 'occupant' | 'emergency';

export interface Recipient {
  id: string;
  houseId: string | null;
  tenantId: string | null;
  role: RecipientRole;
  location: GeoPoint;
  pushToken: string | null;
  phone: string | null;
  email: string | null;
}

// ============================================================================
// Notification Types
// ============================================================================

export enum NotificationChannel {
  PUSH = 'push',
  SMS = 'sms',
  EMAIL = 'email',
  NONE = 'none',
}

export type NotificationTier = 'base' | 'escalation';

export interface NotificationTask {
  readonly id: string;
  readonly recipientId: string;
  readonly incidentId: string;
  readonly channel: NotificationChannel;
  readonly address: string | null;
  readonly tier: NotificationTier;
  readonly title: string;
  readonly body: string;
}

export type TaskStatus = 'pending' | 'sent' | 'failed' | 'cancelled';

export type FailureReason = 'NoChannel' | 'Permanent' | 'RetriesExhausted' | 'Cancelled';

export interface TaskRecord extends NotificationTask {
  status: TaskStatus;
  attempts: number;
  lastError: string | null;
  failureReason: FailureReason | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface DeliveryOutcome {
  taskId: string;
  recipientId: string;
  incidentId: string;
  status: Exclude<TaskStatus, 'pending'>;
  attempts: number;
  error: string | null;
  failureReason: FailureReason | null;
}

export type AttemptResult = 'sent' | 'transient_error' | 'permanent_error' | 'no_channel' | 'cancelled';

export interface DeliveryAuditEntry {
  recipientId: string;
  incidentId: string;
  taskId: string;
  attempt: number;
  result: AttemptResult;
  error: string | null;
  at: Date;
}

// ============================================================================
// Realtime Types
// ============================================================================

export interface BroadcastEnvelope {
  readonly eventType: string;
  readonly payload: unknown;
  readonly timestamp: string; // ISO
}

export interface ConnectionScope {
  tenantId?: string;
  houseId?: string;
}

export interface ScopeFilter {
  tenantId?: string | null;
  houseId?: string | null;
}

export interface ConnectionRecord {
  connectionId: string;
  scope: ConnectionScope;
  connectedAt: Date;
}
