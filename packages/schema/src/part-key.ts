import { z } from "zod";
import { CategorySchema, GenderSchema } from "./enums.js";

export const PartNumberSchema = z.string().regex(/^\d{2,3}$/, "part number must be 2-3 digits");

export const PartKeySchema = z
  .object({
    gender: GenderSchema,
    category: CategorySchema,
    partNum: PartNumberSchema
  })
  .strict()
  .readonly();
export type PartKey = z.infer<typeof PartKeySchema>;
