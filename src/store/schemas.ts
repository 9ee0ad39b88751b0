/**
 * Record schemas used to validate store files on load.
 * Unknown keys pass through so a rewrite keeps them.
 */

import { z } from 'zod';
import type { RecordByKind, RecordKind } from '../types/index.js';

export const probeRecordSchema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
  timestamp: z.number(),
}).passthrough();

export const offsetRecordSchema = z.object({
  z_offset: z.number(),
  timestamp: z.number(),
}).passthrough();

const pointSchema = z.tuple([z.number(), z.number()]);

export const meshSnapshotSchema = z.object({
  timestamp: z.number(),
  profile_name: z.string().nullable(),
  mesh_min: pointSchema.nullable(),
  mesh_max: pointSchema.nullable(),
  probed_matrix: z.array(z.array(z.number())),
}).passthrough();

export const recordSchemas: { [K in RecordKind]: z.ZodType<RecordByKind[K]> } = {
  probes: probeRecordSchema,
  offsets: offsetRecordSchema,
  meshes: meshSnapshotSchema,
};
