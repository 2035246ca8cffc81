// src/middleware/validateEnv.ts
import { z } from "zod";
import type { NutritionSettings } from "../services/settings";

/**
 * Environment variable validation schema.
 * Validates all required environment variables at startup.
 */
const envSchema = z
  .object({
    // Server
    PORT: z.string().default("3000"),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

    // Storage
    STORAGE_DRIVER: z.enum(["memory", "postgres"]).default("memory"),
    DATABASE_URL: z.string().optional(),

    // Entry amounts
    MAX_ENTRY_AMOUNT: z.coerce.number().positive().default(5000),
    SUGAR_SPLIT_POLICY: z.enum(["declared", "undeclaredAsAdded"]).default("declared"),

    // Backup uploads (express body-parser size string)
    BACKUP_MAX_BYTES: z.string().default("50mb"),

    // Daily log defaults (configurable)
    DEFAULT_CALORIES_TARGET: z.coerce.number().nonnegative().default(2000),
    DEFAULT_PROTEIN_TARGET: z.coerce.number().nonnegative().default(50),
    DEFAULT_CARBS_TARGET: z.coerce.number().nonnegative().default(250),
    DEFAULT_FAT_TARGET: z.coerce.number().nonnegative().default(65),
  })
  .refine((env) => env.STORAGE_DRIVER !== "postgres" || Boolean(env.DATABASE_URL), {
    message: "DATABASE_URL is required when STORAGE_DRIVER=postgres",
    path: ["DATABASE_URL"],
  });

export type Env = z.infer<typeof envSchema>;

let validatedEnv: Env | null = null;

/**
 * Validates environment variables at startup.
 * Throws an error if required variables are missing or invalid.
 * Logs warnings for optional but recommended variables.
 */
export function validateEnvironment(source: NodeJS.ProcessEnv = process.env): Env {
  if (validatedEnv) return validatedEnv;

  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error("Environment validation failed:");
    for (const error of result.error.errors) {
      console.error(`  - ${error.path.join(".")}: ${error.message}`);
    }
    throw new Error("Invalid environment configuration. See errors above.");
  }

  validatedEnv = result.data;

  // Warnings for optional but recommended variables
  const warnings: string[] = [];

  if (validatedEnv.STORAGE_DRIVER === "memory" && validatedEnv.NODE_ENV === "production") {
    warnings.push("STORAGE_DRIVER is memory - data is lost on restart");
  }

  if (validatedEnv.DATABASE_URL && validatedEnv.STORAGE_DRIVER === "memory") {
    warnings.push("DATABASE_URL is set but STORAGE_DRIVER is memory - Postgres will not be used");
  }

  if (warnings.length > 0) {
    console.warn("\nEnvironment warnings:");
    warnings.forEach((w) => console.warn(`  - ${w}`));
    console.warn("");
  }

  console.log("Environment validation passed");
  return validatedEnv;
}

/**
 * Get validated environment variables.
 * Must call validateEnvironment() first.
 */
export function getEnv(): Env {
  if (!validatedEnv) {
    throw new Error("Environment not validated. Call validateEnvironment() first.");
  }
  return validatedEnv;
}

/** Forget the cached result so the next call re-reads the environment. */
export function resetEnvironment(): void {
  validatedEnv = null;
}

export function settingsFromEnv(env: Env): NutritionSettings {
  return {
    defaultTargets: {
      calorieTarget: env.DEFAULT_CALORIES_TARGET,
      proteinTarget: env.DEFAULT_PROTEIN_TARGET,
      carbTarget: env.DEFAULT_CARBS_TARGET,
      fatTarget: env.DEFAULT_FAT_TARGET,
    },
    maxEntryAmount: env.MAX_ENTRY_AMOUNT,
    sugarPolicy: env.SUGAR_SPLIT_POLICY,
  };
}

export default validateEnvironment;
