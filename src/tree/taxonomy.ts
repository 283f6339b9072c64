/**
 * taxonomy.ts — Reads the flat lineage taxonomy document (a YAML list of
 * `{ name, alias, parent, children }` entries) into validated records.
 */

import { parse as yamlParse } from 'yaml'
import { z } from 'zod'
import type { TaxonomyRecord } from '../types.js'
import { MalformedTaxonomyError } from '../errors.js'
import { describeIssues } from '../error-utils.js'
import { readFileOrNull } from '../utils/fs.js'

const taxonomyRecordSchema = z
  .object({
    name: z.string().min(1),
    alias: z.string().min(1).nullish(),
    parent: z.string().min(1).nullish(),
    children: z.array(z.string()).nullish(),
  })
  .strip()
  .transform((r): TaxonomyRecord => ({
    name: r.name,
    alias: r.alias ?? r.name,
    ...(r.parent != null ? { parent: r.parent } : {}),
    children: r.children ?? [],
  }))

const taxonomyDocumentSchema = z.array(taxonomyRecordSchema)

/**
 * Parses a taxonomy YAML document. Fields other than name, alias, parent and
 * children are ignored.
 *
 * @throws {MalformedTaxonomyError} if the YAML is malformed or any record
 *   fails validation.
 */
export function parseTaxonomy(text: string): TaxonomyRecord[] {
  let parsed: unknown
  try {
    parsed = yamlParse(text)
  } catch (err) {
    throw new MalformedTaxonomyError(
      `Taxonomy is not valid YAML: ${err instanceof Error ? err.message : String(err)}`
    )
  }

  const result = taxonomyDocumentSchema.safeParse(parsed ?? [])
  if (!result.success) {
    throw new MalformedTaxonomyError(describeIssues('Taxonomy records are invalid:', result.error))
  }
  return result.data
}

/**
 * Reads and parses a taxonomy file.
 *
 * @throws {MalformedTaxonomyError} if the file does not exist or cannot be parsed.
 */
export async function loadTaxonomyFile(filePath: string): Promise<TaxonomyRecord[]> {
  const text = await readFileOrNull(filePath)
  if (text === null) {
    throw new MalformedTaxonomyError(`Taxonomy file not found: ${filePath}`)
  }
  return parseTaxonomy(text)
}
