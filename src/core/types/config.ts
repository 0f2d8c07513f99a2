import { z } from 'zod'

export const ModelConfigSchema = z.object({
  baseUrl: z
    .string({ required_error: 'Model endpoint is required (set SITESCOUT_MODEL_BASE_URL)' })
    .url('Model endpoint must be a valid URL'),
  name: z.string().min(1).default('qwen2.5:32b-instruct-q4_K_M'),
  apiKey: z.string().min(1).default('ollama'),
  timeout: z.number().int().positive().default(30000),
  temperature: z.number().min(0).max(2).default(0),
})

export type ModelConfig = z.infer<typeof ModelConfigSchema>

export const OutputConfigSchema = z.object({
  file: z.string().min(1).default('website_status.json'),
  includeNotes: z.boolean().default(false),
})

export type OutputConfig = z.infer<typeof OutputConfigSchema>

// Main configuration object
export const SiteScoutConfigSchema = z.object({
  catalog: z.string().min(1).optional(), // path to a catalog JSON file, bundled list when unset
  concurrency: z.number().int().positive().default(5), // tabs per category
  categoryConcurrency: z.number().int().positive().default(1),
  timeout: z.number().int().positive().default(30000), // per probe attempt
  probeAttempts: z.number().int().positive().default(2),
  classifyAttempts: z.number().int().positive().default(2),
  headless: z.boolean().default(true),
  maxSignalLength: z.number().int().positive().default(4000),
  model: ModelConfigSchema,
  output: OutputConfigSchema.default({}),
  logFile: z.string().min(1).optional(),
})

export type SiteScoutConfig = z.infer<typeof SiteScoutConfigSchema>

// Input shape accepted by the loaders, before defaults are applied
export type SiteScoutConfigInput = z.input<typeof SiteScoutConfigSchema>
