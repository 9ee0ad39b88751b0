/**
 * Extractors
 *
 * Pure mapping from Moonraker payloads to records. Log lines that do not
 * match a pattern are skipped, they are not errors.
 */

import { z } from 'zod';
import type {
  GcodeStoreEntry,
  MeshSnapshot,
  OffsetRecord,
  ProbeRecord,
} from '../types/index.js';

// =============================================================================
// PATTERNS
// =============================================================================

/** Anchored at the start of the message */
export const PROBE_PATTERN = /^probe at ([\d.]+),([\d.]+) is z=([-\d.]+)/;

/** Anywhere in the message, which may span several lines */
export const Z_OFFSET_PATTERN = /probe: z_offset: ([-\d.]+)/;

/** Line announcing that a fresh mesh has been probed */
export const MESH_COMPLETE_MARKER = 'Mesh Bed Leveling Complete';

// =============================================================================
// PAYLOAD SCHEMAS
// =============================================================================

const gcodeStoreEntrySchema = z.object({
  message: z.string(),
  time: z.number(),
  type: z.string().optional(),
});

const gcodeStoreResultSchema = z.object({
  gcode_store: z.array(z.unknown()).default([]),
});

const pointSchema = z.tuple([z.number(), z.number()]);

const bedMeshSchema = z
  .object({
    profile_name: z.string().nullable().optional(),
    mesh_min: pointSchema.nullable().optional(),
    mesh_max: pointSchema.nullable().optional(),
    probed_matrix: z.array(z.array(z.number())).optional(),
  })
  .passthrough();

const objectsQueryResultSchema = z.object({
  status: z
    .object({
      bed_mesh: bedMeshSchema.nullable().optional(),
    })
    .passthrough()
    .nullable()
    .optional(),
});

/**
 * Entries of a `server.gcode_store` result.
 * Entries without a string message and numeric time are dropped.
 */
export function parseGcodeStore(result: unknown): GcodeStoreEntry[] {
  const parsed = gcodeStoreResultSchema.safeParse(result);
  if (!parsed.success) return [];

  const entries: GcodeStoreEntry[] = [];
  for (const item of parsed.data.gcode_store) {
    const entry = gcodeStoreEntrySchema.safeParse(item);
    if (entry.success) {
      entries.push(entry.data);
    }
  }
  return entries;
}

// =============================================================================
// EXTRACTORS
// =============================================================================

export function extractProbes(entries: GcodeStoreEntry[]): ProbeRecord[] {
  const probes: ProbeRecord[] = [];

  for (const entry of entries) {
    const match = PROBE_PATTERN.exec(entry.message);
    if (!match) continue;

    const [x, y, z] = [match[1], match[2], match[3]].map(Number);
    if (![x, y, z].every(Number.isFinite)) continue;

    probes.push({ x, y, z, timestamp: entry.time });
  }

  return probes;
}

export function extractOffsets(entries: GcodeStoreEntry[]): OffsetRecord[] {
  const offsets: OffsetRecord[] = [];

  for (const entry of entries) {
    const match = Z_OFFSET_PATTERN.exec(entry.message);
    if (!match) continue;

    const zOffset = Number(match[1]);
    if (!Number.isFinite(zOffset)) continue;

    offsets.push({ z_offset: zOffset, timestamp: entry.time });
  }

  return offsets;
}

/**
 * Current bed mesh from a `printer.objects.query` result, or undefined when
 * the printer reports no mesh or the mesh has no probed matrix.
 *
 * @param now - clock in seconds; the daemon does not timestamp this object
 */
export function extractMesh(
  result: unknown,
  now: () => number = () => Date.now() / 1000
): MeshSnapshot | undefined {
  const parsed = objectsQueryResultSchema.safeParse(result);
  if (!parsed.success) return undefined;

  const bedMesh = parsed.data.status?.bed_mesh;
  if (!bedMesh || bedMesh.probed_matrix === undefined) return undefined;

  return {
    timestamp: now(),
    profile_name: bedMesh.profile_name ?? null,
    mesh_min: bedMesh.mesh_min ?? null,
    mesh_max: bedMesh.mesh_max ?? null,
    probed_matrix: bedMesh.probed_matrix,
  };
}

/**
 * Whether a `notify_gcode_response` line reports a finished mesh
 */
export function isMeshCompleteLine(line: string): boolean {
  return line.includes(MESH_COMPLETE_MARKER);
}
