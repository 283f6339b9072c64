import { z } from 'zod'
import { describeIssues } from './error-utils.js'

// ---------------------------------------------------------------------------
// Frequency validation
// ---------------------------------------------------------------------------

/**
 * Date-bin width: an optional positive multiplier followed by D (days) or
 * W (weeks), e.g. "7D", "2W", "D".
 */
export const FREQUENCY_RE = /^([1-9]\d*)?([DW])$/

const frequencyField = z
  .string()
  .refine((v) => FREQUENCY_RE.test(v), {
    message: 'frequency must look like "7D" or "2W" (positive count, D or W unit)',
  })
  .nullable()

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

/** Greedy cluster splitter settings. */
const clusteringSchema = z
  .object({
    /** Number of representative lineages to select (synthetic root included). */
    targetSize: z.number().int().min(1).default(12),
    /**
     * Prune threshold: an exclusive cluster smaller than `alpha` times the mean
     * inclusive cluster is merged back into its ancestor.
     */
    alpha: z.number().min(0).lt(1, 'alpha must be below 1').default(0.1),
    /**
     * Iterations after which pruning is disabled. null = 8 × tree size.
     */
    maxIterations: z.number().int().min(1).nullable().default(null),
  })
  .strip()

const projectionSchema = z
  .object({
    /** Rows whose clustered mass is below this are marked missing. */
    coverageThreshold: z.number().min(0).max(1).default(0.5),
  })
  .strip()

const groupsSchema = z
  .object({
    /**
     * Reward per number of nested descendants when picking legend group
     * anchors. Index k scores an anchor with k selected descendants.
     */
    countScores: z.array(z.number().min(0)).default([0, 2, 3, 2, 1]),
  })
  .strip()

const binningSchema = z
  .object({
    /** Bin width; null = a single bin covering the whole date range. */
    frequency: frequencyField.default('7D'),
    /** Sample value column to aggregate. */
    column: z.string().min(1).default('prevalence'),
    /** true = per-bin shares summing to 1; false = weighted per-category means. */
    normalize: z.boolean().default(true),
  })
  .strip()

const weightsSchema = z
  .object({
    /** Sewershed population assumed when a sample does not report one. */
    defaultPopulation: z.number().positive().default(1000),
    /** Normalized viral load assumed when a sample does not report one. */
    defaultViralLoad: z.number().min(0).default(0.5),
    /** Whether sample weights include viral load. */
    loaded: z.boolean().default(true),
  })
  .strip()

const baselineSchema = z
  .object({
    iterations: z.number().int().min(0).default(128),
    /** PRNG seed; null = seed from Math.random. */
    seed: z.number().int().nullable().default(null),
  })
  .strip()

const colorsSchema = z
  .object({
    hueSpan: z.number().min(0).max(1).default(0.75),
    baseValue: z.number().min(0).max(1).default(0.55),
    emphasisBonus: z.number().min(0).max(1).default(0.25),
  })
  .strip()
  .refine((c) => c.baseValue + c.emphasisBonus <= 1, {
    message: 'baseValue + emphasisBonus must not exceed 1',
  })

/**
 * Zod schema for the full lineage-river configuration.
 *
 * - Unknown keys are stripped, not rejected.
 * - All fields have defaults; an empty object `{}` produces a fully-valid config.
 */
export const riverConfigSchema = z
  .object({
    clustering: clusteringSchema.default({}),
    projection: projectionSchema.default({}),
    groups: groupsSchema.default({}),
    binning: binningSchema.default({}),
    weights: weightsSchema.default({}),
    baseline: baselineSchema.default({}),
    colors: colorsSchema.default({}),
  })
  .strip()

// ---------------------------------------------------------------------------
// Unknown-key helpers for parseConfig
// ---------------------------------------------------------------------------

const SUB_SCHEMA_SHAPES: Record<string, ReadonlySet<string>> = {
  clustering: new Set(Object.keys(clusteringSchema.shape)),
  projection: new Set(Object.keys(projectionSchema.shape)),
  groups: new Set(Object.keys(groupsSchema.shape)),
  binning: new Set(Object.keys(binningSchema.shape)),
  weights: new Set(Object.keys(weightsSchema.shape)),
  baseline: new Set(Object.keys(baselineSchema.shape)),
  colors: new Set(Object.keys(colorsSchema.innerType().shape)),
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v)
}

/**
 * Returns unknown key paths in `raw` at the top level and one level deep
 * inside recognised sections (e.g. `"binning.freq"`).
 */
function collectUnknownConfigKeys(raw: Record<string, unknown>): readonly string[] {
  const topLevelKnown = new Set(Object.keys(riverConfigSchema.shape))
  const result: string[] = []
  for (const [key, nested] of Object.entries(raw)) {
    if (!topLevelKnown.has(key)) {
      result.push(key)
      continue
    }
    const subShape = SUB_SCHEMA_SHAPES[key]
    if (subShape === undefined || !isPlainObject(nested)) continue
    for (const subKey of Object.keys(nested)) {
      if (!subShape.has(subKey)) result.push(`${key}.${subKey}`)
    }
  }
  return result
}

/** Options accepted by {@link parseConfig}. */
export interface ParseConfigOptions {
  /**
   * Called with all unknown key paths (e.g. `["unknownTop", "binning.freq"]`).
   * @example
   *   parseConfig(raw, {
   *     onUnknownKeys: (keys) => console.warn(`[river] unknown config keys: ${keys.join(', ')}`)
   *   })
   */
  onUnknownKeys?: (keys: readonly string[]) => void
}

// ---------------------------------------------------------------------------
// Exported types
// ---------------------------------------------------------------------------

type DeepReadonly<T> =
  T extends (infer U)[]
    ? ReadonlyArray<DeepReadonly<U>>
    : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T

/** Fully-resolved configuration with all defaults applied. Immutable. */
export type RiverConfig = DeepReadonly<z.infer<typeof riverConfigSchema>>

// ---------------------------------------------------------------------------
// ConfigValidationError
// ---------------------------------------------------------------------------

/**
 * Thrown by `parseConfig` when the input contains invalid values.
 * The message lists every failing field; the `ZodError` is kept as `cause`.
 */
export class ConfigValidationError extends Error {
  readonly issues: readonly z.ZodIssue[]

  constructor(zodError: z.ZodError) {
    super(describeIssues('lineage-river configuration is invalid:', zodError), { cause: zodError })
    this.name = 'ConfigValidationError'
    this.issues = zodError.errors
  }
}

// ---------------------------------------------------------------------------
// Parse function
// ---------------------------------------------------------------------------

/**
 * Parses and validates raw (unknown) config input, applying all defaults.
 *
 * Unknown keys are stripped. `undefined`, `{}` and a missing section all
 * produce defaults.
 *
 * @throws {ConfigValidationError} if the input contains invalid values.
 */
export function parseConfig(raw: unknown, options: ParseConfigOptions = {}): RiverConfig {
  const result = riverConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new ConfigValidationError(result.error)
  }

  if (isPlainObject(raw) && options.onUnknownKeys !== undefined) {
    const unknownKeys = collectUnknownConfigKeys(raw)
    if (unknownKeys.length > 0) options.onUnknownKeys(unknownKeys)
  }

  return result.data
}
