import { z } from "zod";
import { CollisionPolicySchema, type CollisionPolicy } from "@part-sorter/schema";
import { COLLISION_ENV_VAR, ROOT_ENV_VAR, VERBOSE_ENV_VAR } from "./constants.js";

const SorterEnvSchema = z.object({
  [ROOT_ENV_VAR]: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  [COLLISION_ENV_VAR]: z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value) => (value ? value : undefined))
    .pipe(CollisionPolicySchema.default("overwrite")),
  [VERBOSE_ENV_VAR]: z
    .string()
    .optional()
    .transform((value) => value === "1" || value?.toLowerCase() === "true")
});

export interface SorterConfig {
  root?: string;
  collisionPolicy: CollisionPolicy;
  verbose: boolean;
}

export function loadSorterConfig(env: NodeJS.ProcessEnv = process.env): SorterConfig {
  const parsed = SorterEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid environment ${issue?.path.join(".") ?? ""}: ${issue?.message ?? "unknown error"}`);
  }

  return {
    root: parsed.data[ROOT_ENV_VAR],
    collisionPolicy: parsed.data[COLLISION_ENV_VAR],
    verbose: parsed.data[VERBOSE_ENV_VAR]
  };
}
