import { z } from "zod";
import { CategorySchema, GenderSchema, TransferModeSchema } from "./enums.js";
import { PartNumberSchema } from "./part-key.js";

export const TransferRecordSchema = z
  .object({
    from: z.string().min(1),
    to: z.string().min(1)
  })
  .strict();
export type TransferRecord = z.infer<typeof TransferRecordSchema>;

export const ManifestKeySchema = z
  .object({
    gender: GenderSchema,
    category: CategorySchema,
    part_num: PartNumberSchema
  })
  .strict();
export type ManifestKey = z.infer<typeof ManifestKeySchema>;

export const ManifestSelectedSchema = z
  .object({
    FACE: TransferRecordSchema.optional(),
    SV: TransferRecordSchema.optional(),
    TV: TransferRecordSchema.optional(),
    TVD: TransferRecordSchema.optional(),
    ICON: TransferRecordSchema.optional()
  })
  .strict();
export type ManifestSelected = z.infer<typeof ManifestSelectedSchema>;

export const ManifestMasksSchema = z
  .object({
    SV: z.array(TransferRecordSchema).default([]),
    TV: z.array(TransferRecordSchema).default([]),
    TVD: z.array(TransferRecordSchema).default([])
  })
  .strict();
export type ManifestMasks = z.infer<typeof ManifestMasksSchema>;

/**
 * Audit record written next to the sorted files of one relocation call.
 * Field names are snake_case on disk (`part_num`) to match existing logs.
 */
export const ManifestRecordSchema = z
  .object({
    mode: TransferModeSchema,
    key: ManifestKeySchema,
    selected: ManifestSelectedSchema,
    masks: ManifestMasksSchema
  })
  .strict();
export type ManifestRecord = z.infer<typeof ManifestRecordSchema>;
