import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Recipient, SensorPlacement } from '@emberline/core';
import type { PipelineStore } from './types.js';

const latitude = z.number().min(-90).max(90);
const longitude = z.number().min(-180).max(180);

const directorySchema = z.object({
  placements: z
    .array(
      z.object({
        sensorId: z.string().min(1),
        houseId: z.string().min(1),
        tenantId: z.string().min(1),
        latitude,
        longitude,
      }),
    )
    .default([]),
  recipients: z
    .array(
      z.object({
        id: z.string().min(1),
        houseId: z.string().min(1).nullable().default(null),
        tenantId: z.string().min(1).nullable().default(null),
        role: z.enum(['occupant', 'emergency']).default('occupant'),
        latitude,
        longitude,
        pushToken: z.string().min(1).nullable().default(null),
        phone: z.string().min(1).nullable().default(null),
        email: z.string().email().nullable().default(null),
      }),
    )
    .default([]),
});

export interface DirectorySeed {
  placements: SensorPlacement[];
  recipients: Recipient[];
}

/** Validate a directory document (sensor placements and recipients). Throws a ZodError on bad input. */
export function parseDirectorySeed(data: unknown): DirectorySeed {
  const parsed = directorySchema.parse(data);
  return {
    placements: parsed.placements.map((p) => ({
      sensorId: p.sensorId,
      houseId: p.houseId,
      tenantId: p.tenantId,
      location: { latitude: p.latitude, longitude: p.longitude },
    })),
    recipients: parsed.recipients.map((r) => ({
      id: r.id,
      houseId: r.houseId,
      tenantId: r.tenantId,
      role: r.role,
      location: { latitude: r.latitude, longitude: r.longitude },
      pushToken: r.pushToken,
      phone: r.phone,
      email: r.email,
    })),
  };
}

export async function applyDirectorySeed(store: PipelineStore, seed: DirectorySeed): Promise<{ placements: number; recipients: number }> {
  for (const placement of seed.placements) {
    await store.upsertSensorPlacement(placement);
  }
  for (const recipient of seed.recipients) {
    await store.upsertRecipient(recipient);
  }
  return { placements: seed.placements.length, recipients: seed.recipients.length };
}

export async function loadDirectorySeed(store: PipelineStore, filePath: string): Promise<{ placements: number; recipients: number }> {
  const raw = await readFile(filePath, 'utf8');
  return applyDirectorySeed(store, parseDirectorySeed(JSON.parse(raw)));
}
