import { z } from "zod";

/* ============================================================================
 * Credentials
 * ========================================================================== */

export const CredentialsSchema = z.object({
  "api-key": z.string().min(1),
  "base-url": z.url().optional(),
  organization: z.string().optional(),
});

export type Credentials = z.infer<typeof CredentialsSchema>;

/* ============================================================================
 * Pricing
 * ========================================================================== */

export const ModelPricingSchema = z.object({
  input: z.number().nonnegative(),
  output: z.number().nonnegative(),
  unit: z.number().positive(),
  currency: z.string().default("USD"),
});

/* ============================================================================
 * Provider Config
 * ========================================================================== */

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const ProviderConfigSchema = z.object({
  credentials: CredentialsSchema,
  pricing: z.record(z.string(), ModelPricingSchema).optional(),
  "completion-models": z.array(z.string()).optional(),
  "log-level": LogLevelSchema.optional(),
});

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
