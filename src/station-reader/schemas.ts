/**
 * Zod schemas for station records.
 * Metadata parsed from a header is validated against StationMetadataSchema before it is returned.
 */

import { z } from "zod";

// ─── Enums ─────────────────────────────────────────────────────────────────

export const VariableCode = z.enum(["PPT", "TMAX", "TMIN"]);
export type VariableCode = z.infer<typeof VariableCode>;

export const QcCode = z.enum(["valid", "suspect", "disagree", "secondary", "missing"]);
export type QcCode = z.infer<typeof QcCode>;

export const EcCode = z.enum([
  "none",
  "duplicate",
  "gap",
  "internal-consistency",
  "streak",
  "multiday-length",
  "megaconsistency",
  "naught",
  "climatological-outlier",
  "lagged-range",
  "spatial-consistency",
  "temporal-consistency",
  "ninety-nine-check",
  "bounds",
]);
export type EcCode = z.infer<typeof EcCode>;

export const ReadMode = z.enum(["strict", "permissive"]);
export type ReadMode = z.infer<typeof ReadMode>;

// ─── Records ───────────────────────────────────────────────────────────────

/** ISO calendar date, YYYY-MM-DD. */
export const CalendarDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");
export type CalendarDate = z.infer<typeof CalendarDateSchema>;

export const StationMetadataSchema = z
  .object({
    format: z.literal("1.0"),
    cleaning: z.number().int().optional(),
    created: CalendarDateSchema.optional(),
    variable: VariableCode,
    country: z.string().regex(/^[A-Z]{2}$/, "expected an ISO 3166 alpha-2 code").optional(),
    id: z.string().min(1),
    name: z.string().min(1).optional(),
    latitude: z.number().min(-90).max(90).optional(),
    longitude: z.number().min(-180).max(180).optional(),
    altitude: z.number().optional(),
    startDate: CalendarDateSchema.optional(),
    endDate: CalendarDateSchema.optional(),
  })
  .refine((m) => m.startDate == null || m.endDate == null || m.startDate <= m.endDate, {
    message: "START_DATE is after END_DATE",
    path: ["endDate"],
  });
export type StationMetadata = Readonly<z.infer<typeof StationMetadataSchema>>;

export const ObservationSchema = z.object({
  /** Station sub-identifier from the ID column, e.g. 0009084_7 */
  stationId: z.string().min(1),
  /** SOUID column, kept verbatim */
  sourceId: z.string(),
  date: CalendarDateSchema,
  /** null when the file holds the undefined sentinel (-999) */
  value: z.number().finite().nullable(),
  qc: QcCode,
  ec: EcCode,
  /** 1-based line in the source text */
  lineNumber: z.number().int().positive(),
});
export type Observation = Readonly<z.infer<typeof ObservationSchema>>;
