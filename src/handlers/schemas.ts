/**
 * Request schemas
 *
 * Time fields take seconds or a timestamp string (`HH:MM:SS(.ms)`, `MM:SS`).
 * Only the payload's shape is checked here; the timeline store enforces the
 * model rules (ranges, overlaps, known videos) when the project is loaded.
 */

import { z } from 'zod';
import { parseTimestamp } from '../utils/timecode';

const timeValue = z.union([z.number(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'number') return value;
  const seconds = parseTimestamp(value);
  if (seconds === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp "${value}"` });
    return z.NEVER;
  }
  return seconds;
});

const rotation = z.union([z.literal(0), z.literal(90), z.literal(180), z.literal(270)]);

export const videoSchema = z.object({
  id: z.string().min(1),
  path: z.string().min(1),
  order: z.number().int().optional(),
  duration: timeValue,
  frameRate: z.number().positive().nullable().optional(),
  rotation: rotation.optional(),
  rotationOverride: rotation.nullable().optional(),
});

export const segmentSchema = z.object({
  id: z.string().min(1).optional(),
  videoId: z.string().min(1),
  start: timeValue,
  end: timeValue,
  label: z.string().optional(),
  speed: z.number().positive().optional(),
  order: z.number().int().optional(),
});

export const noteSchema = z.object({
  id: z.string().min(1).optional(),
  videoId: z.string().min(1),
  kind: z.enum(['comment', 'chapter']),
  timestamp: timeValue,
  body: z.string().optional(),
});

export const gapPolicySchema = z.object({
  enabled: z.boolean(),
  speed: z.number().positive().optional(),
});

export const projectSchema = z.object({
  videos: z.array(videoSchema),
  segments: z.array(segmentSchema).default([]),
  notes: z.array(noteSchema).default([]),
  gapPolicy: gapPolicySchema.optional(),
});

export type ProjectPayload = z.output<typeof projectSchema>;

export const planRequestSchema = z.object({
  project: projectSchema,
});

export const exportRequestSchema = z.object({
  project: projectSchema,
  exportDir: z.string().min(1),
});

export const probeRequestSchema = z.object({
  paths: z.array(z.string().min(1)).min(1),
});
