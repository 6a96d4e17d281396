import { z } from "zod";

export const GenderSchema = z.enum(["Female", "Male", "Kid"]);
export type Gender = z.infer<typeof GenderSchema>;

export const CategorySchema = z.enum([
  "AccA",
  "AccB",
  "Beard",
  "BeastEars",
  "Cloak",
  "Clothing",
  "Ears",
  "Eyebrows",
  "Eyes",
  "Face",
  "FacialMark",
  "FrontHair",
  "Glasses",
  "Mouth",
  "Nose",
  "RearHair",
  "Tail",
  "Wing"
]);
export type Category = z.infer<typeof CategorySchema>;

export const ComponentRoleSchema = z.enum(["FACE", "SV", "TV", "TVD", "ICON"]);
export type ComponentRole = z.infer<typeof ComponentRoleSchema>;

// Battler sheets are the only roles that ship *_c overlay masks.
export const MaskRoleSchema = z.enum(["SV", "TV", "TVD"]);
export type MaskRole = z.infer<typeof MaskRoleSchema>;

export const TransferModeSchema = z.enum(["copy", "move"]);
export type TransferMode = z.infer<typeof TransferModeSchema>;

export const CollisionPolicySchema = z.enum(["overwrite", "reject"]);
export type CollisionPolicy = z.infer<typeof CollisionPolicySchema>;
