import { z } from 'zod';

// ── Config file ─────────────────────────────────────────────

export const fileConfigSchema = z.object({
  modules: z.array(z.string().min(1)).optional().default([]),
  batchPerModule: z.boolean().optional().default(false),
  failOnEmpty: z.boolean().optional().default(false),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ── Environment overrides ───────────────────────────────────

const envFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((flag) => flag === 'true' || flag === '1');

export const envOverridesSchema = z.object({
  batchPerModule: envFlagSchema.optional(),
  failOnEmpty: envFlagSchema.optional(),
});

export type EnvOverrides = z.infer<typeof envOverridesSchema>;

// ── Resolved run settings ───────────────────────────────────

export const runSettingsSchema = z.object({
  modules: z.array(z.string().min(1)),
  batchPerModule: z.boolean(),
  failOnEmpty: z.boolean(),
});

export type RunSettings = z.infer<typeof runSettingsSchema>;
