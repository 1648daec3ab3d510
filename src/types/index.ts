import { z } from "zod/v4";

// A raw source value, as a CSV cell or JSON member delivers it
export const RawValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
]);

// Recognized fields of a near-Earth object record. Unknown keys are stripped.
export const NeoFieldsSchema = z.object({
  designation: RawValueSchema.optional(),
  name: RawValueSchema.optional(),
  diameter: RawValueSchema.optional(),
  hazardous: RawValueSchema.optional(),
});

// Recognized fields of a close approach record. Unknown keys are stripped.
export const ApproachFieldsSchema = z.object({
  designation: RawValueSchema.optional(),
  time: RawValueSchema.optional(),
  distance: RawValueSchema.optional(),
  velocity: RawValueSchema.optional(),
});

export type RawValue = z.infer<typeof RawValueSchema>;
export type NeoFields = z.infer<typeof NeoFieldsSchema>;
export type ApproachFields = z.infer<typeof ApproachFieldsSchema>;

/**
 * Validate an untyped record as near-Earth object fields
 */
export function parseNeoFields(data: unknown): NeoFields {
  return NeoFieldsSchema.parse(data);
}

/**
 * Validate an untyped record as close approach fields
 */
export function parseApproachFields(data: unknown): ApproachFields {
  return ApproachFieldsSchema.parse(data);
}

// Serialized shapes, consumed by CSV and JSON writers

/** Flat export row for a near-Earth object */
export interface NeoRow {
  designation: string;
  /** Empty string when the object has no IAU name */
  name: string;
  /** Kilometers; NaN when unknown */
  diameter_km: number;
  potentially_hazardous: boolean;
}

/** Export row for a close approach, with its object nested */
export interface ApproachRow {
  /** "YYYY-MM-DD HH:MM", or empty when the time is unknown */
  datetime_utc: string;
  distance_au: number;
  velocity_km_s: number;
  neo: NeoRow;
}
