import { group } from 'd3-array'
import type { ZodError } from 'zod'

/** Failing fields listed before the rest are counted as "... and N more". */
const MAX_LISTED_FIELDS = 8

/** `["clustering", "alpha"]` → `clustering.alpha`; `[1, "name"]` → `[1].name`. */
export function issuePath(path: readonly (string | number)[]): string {
  let out = ''
  for (const seg of path) {
    out += typeof seg === 'number' ? `[${seg}]` : out === '' ? seg : `.${seg}`
  }
  return out === '' ? '(top level)' : out
}

/**
 * A heading followed by one indented line per failing field. Several
 * messages on the same field share its line.
 */
export function describeIssues(heading: string, error: ZodError, maxFields = MAX_LISTED_FIELDS): string {
  const byField = group(error.issues, (issue) => issuePath(issue.path))
  const lines = [...byField]
    .slice(0, maxFields)
    .map(([field, issues]) => `  ${field}: ${issues.map((i) => i.message).join('; ')}`)
  if (byField.size > maxFields) lines.push(`  ... and ${byField.size - maxFields} more`)
  return [heading, ...lines].join('\n')
}
