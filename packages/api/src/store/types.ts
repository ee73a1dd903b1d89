import type {
  AlarmIncident,
  DeliveryAuditEntry,
  DeviceState,
  GeoPoint,
  IncidentState,
  NotificationTier,
  Recipient,
  SensorPlacement,
  TaskRecord,
} from '@emberline/core';

export interface RecipientMatch {
  recipient: Recipient;
  distanceMeters: number;
}

/**
 * Durable state read and written by the pipeline. Every method is async so
 * the SQLite implementation can be swapped for a networked one.
 */
export interface PipelineStore {
  // Device state
  getDeviceState(id: string): Promise<DeviceState | null>;
  saveDeviceState(state: DeviceState): Promise<void>;
  listDeviceStates(): Promise<DeviceState[]>;

  // Incidents
  getIncident(id: string): Promise<AlarmIncident | null>;
  saveIncident(incident: AlarmIncident): Promise<void>;
  findOpenIncidentForSensor(sensorId: string): Promise<AlarmIncident | null>;
  listIncidents(state?: IncidentState): Promise<AlarmIncident[]>;

  // Directory
  getSensorPlacement(sensorId: string): Promise<SensorPlacement | null>;
  upsertSensorPlacement(placement: SensorPlacement): Promise<void>;
  upsertRecipient(recipient: Recipient): Promise<void>;
  findWithinRadius(point: GeoPoint, radiusMeters: number): Promise<RecipientMatch[]>;
  findRecipientsByHouse(houseId: string): Promise<Recipient[]>;

  // Notification tasks
  saveTask(task: TaskRecord): Promise<void>;
  getTask(id: string): Promise<TaskRecord | null>;
  listTasksForIncident(incidentId: string, tier?: NotificationTier): Promise<TaskRecord[]>;
  listFailedTasks(): Promise<TaskRecord[]>;

  // Delivery audit
  appendAudit(entry: DeliveryAuditEntry): Promise<void>;
  listAudit(filter?: { recipientId?: string; incidentId?: string }): Promise<DeliveryAuditEntry[]>;

  close(): Promise<void>;
}
