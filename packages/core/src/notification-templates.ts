/**
 * Notification templates for the Emberline platform.
 * Used by the notification router to render push, SMS and email messages.
 */

import { NotificationChannel, type NotificationTier } from './types.js';

export type TemplateChannel = Exclude<NotificationChannel, NotificationChannel.NONE>;

export interface NotificationTemplate {
  id: string;
  name: string;
  channel: TemplateChannel;
  subject?: string; // email subject, push title
  body: string;
  variables: string[];
}

// Variable interpolation: {{variableName}}
export function renderTemplate(template: NotificationTemplate, vars: Record<string, string>): {
  subject?: string;
  body: string;
} {
  let body = template.body;
  let subject = template.subject;

  for (const [key, value] of Object.entries(vars)) {
    const pattern = new RegExp(`\\{\\{${key}\\}\\}`, 'g');
    body = body.replace(pattern, () => value);
    if (subject) subject = subject.replace(pattern, () => value);
  }

  return { subject, body };
}

// --- Fire alarm ---

export const FIRE_ALARM_PUSH: NotificationTemplate = {
  id: 'fire-alarm-push',
  name: 'Fire Alarm (Push)',
  channel: NotificationChannel.PUSH,
  subject: 'FIRE ALARM ({{severity}})',
  body: 'Smoke detector {{sensorId}} triggered at house {{houseId}}. Leave the building and call emergency services.',
  variables: ['severity', 'sensorId', 'houseId'],
};

export const FIRE_ALARM_SMS: NotificationTemplate = {
  id: 'fire-alarm-sms',
  name: 'Fire Alarm (SMS)',
  channel: NotificationChannel.SMS,
  body: 'FIRE ALARM ({{severity}}): detector {{sensorId}} at house {{houseId}} triggered at {{triggeredAt}}. Evacuate and call emergency services.',
  variables: ['severity', 'sensorId', 'houseId', 'triggeredAt'],
};

export const FIRE_ALARM_EMAIL: NotificationTemplate = {
  id: 'fire-alarm-email',
  name: 'Fire Alarm (Email)',
  channel: NotificationChannel.EMAIL,
  subject: 'FIRE ALARM - house {{houseId}}',
  body: `FIRE ALARM

Detector {{sensorId}} at house {{houseId}} reported a {{severity}} severity alarm.

Incident: {{incidentId}}
Time: {{triggeredAt}}

Instructions:
- Leave the building immediately
- Do not use elevators
- Call emergency services
- Do not re-enter until cleared

This message was sent by Emberline.`,
  variables: ['sensorId', 'houseId', 'severity', 'incidentId', 'triggeredAt'],
};

// --- Escalation ---

export const FIRE_ESCALATION_PUSH: NotificationTemplate = {
  id: 'fire-escalation-push',
  name: 'Fire Alarm Escalation (Push)',
  channel: NotificationChannel.PUSH,
  subject: 'UNACKNOWLEDGED FIRE ALARM NEARBY',
  body: 'A {{severity}} fire alarm near you (house {{houseId}}) has not been acknowledged. Check on your neighbours and call emergency services.',
  variables: ['severity', 'houseId'],
};

export const FIRE_ESCALATION_SMS: NotificationTemplate = {
  id: 'fire-escalation-sms',
  name: 'Fire Alarm Escalation (SMS)',
  channel: NotificationChannel.SMS,
  body: 'UNACKNOWLEDGED FIRE ALARM ({{severity}}) near you at house {{houseId}} since {{triggeredAt}}. Call emergency services.',
  variables: ['severity', 'houseId', 'triggeredAt'],
};

export const FIRE_ESCALATION_EMAIL: NotificationTemplate = {
  id: 'fire-escalation-email',
  name: 'Fire Alarm Escalation (Email)',
  channel: NotificationChannel.EMAIL,
  subject: 'ESCALATED FIRE ALARM - house {{houseId}}',
  body: `ESCALATED FIRE ALARM

A fire alarm at house {{houseId}} has not been acknowledged and was escalated to {{severity}} severity.

Incident: {{incidentId}}
Triggered: {{triggeredAt}}

If you are nearby, keep clear of the building and call emergency services.

This message was sent by Emberline.`,
  variables: ['houseId', 'severity', 'incidentId', 'triggeredAt'],
};

// --- Device maintenance ---

export const LOW_BATTERY_PUSH: NotificationTemplate = {
  id: 'low-battery-push',
  name: 'Low Battery (Push)',
  channel: NotificationChannel.PUSH,
  subject: 'Detector battery low',
  body: 'Device {{deviceId}} reports {{batteryLevel}} V. Replace the battery soon.',
  variables: ['deviceId', 'batteryLevel'],
};

// --- All templates grouped by category ---

export const NOTIFICATION_TEMPLATES = {
  alarms: [
    FIRE_ALARM_PUSH,
    FIRE_ALARM_SMS,
    FIRE_ALARM_EMAIL,
  ],
  escalations: [
    FIRE_ESCALATION_PUSH,
    FIRE_ESCALATION_SMS,
    FIRE_ESCALATION_EMAIL,
  ],
  maintenance: [
    LOW_BATTERY_PUSH,
  ],
};

export function getTemplateById(id: string): NotificationTemplate | undefined {
  for (const category of Object.values(NOTIFICATION_TEMPLATES)) {
    const found = category.find((t) => t.id === id);
    if (found) return found;
  }
  return undefined;
}

export function getTemplatesByChannel(channel: TemplateChannel): NotificationTemplate[] {
  const result: NotificationTemplate[] = [];
  for (const category of Object.values(NOTIFICATION_TEMPLATES)) {
    result.push(...category.filter((t) => t.channel === channel));
  }
  return result;
}

/** Template for an incident fan-out on the given channel and tier. */
export function getIncidentTemplate(channel: TemplateChannel, tier: NotificationTier): NotificationTemplate {
  const category = tier === 'escalation' ? NOTIFICATION_TEMPLATES.escalations : NOTIFICATION_TEMPLATES.alarms;
  const found = category.find((t) => t.channel === channel);
  if (!found) {
    throw new Error(`No ${tier} template for channel ${channel}`);
  }
  return found;
}
