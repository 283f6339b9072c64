/**
 * builder.ts — Builds the immutable lineage tree from flat taxonomy records.
 *
 * Every record without a parent hangs from the synthetic root `*`. Dense
 * `lindex` values come from the sorted list of all names (root included), so
 * the same taxonomy always yields the same indices.
 */

import { ROOT_NAME } from '../types.js'
import type { LineageIndex, LineageNode, LineageTree, TaxonomyRecord } from '../types.js'
import { MalformedTaxonomyError } from '../errors.js'

/** Number of offending names quoted in an error message. */
const MAX_NAMES_IN_ERROR = 5

function quoteNames(names: readonly string[]): string {
  const shown = names.slice(0, MAX_NAMES_IN_ERROR).map((n) => `"${n}"`).join(', ')
  return names.length > MAX_NAMES_IN_ERROR ? `${shown} and ${names.length - MAX_NAMES_IN_ERROR} more` : shown
}

function validateRecords(records: readonly TaxonomyRecord[]): Map<string, TaxonomyRecord> {
  const byName = new Map<string, TaxonomyRecord>()
  for (const record of records) {
    if (record.name === ROOT_NAME) {
      throw new MalformedTaxonomyError(`Lineage name "${ROOT_NAME}" is reserved for the synthetic root`)
    }
    if (byName.has(record.name)) {
      throw new MalformedTaxonomyError(`Duplicate lineage "${record.name}"`)
    }
    if (record.parent === record.name) {
      throw new MalformedTaxonomyError(`Lineage "${record.name}" is its own parent`)
    }
    byName.set(record.name, record)
  }

  const missing = records
    .filter((r) => r.parent !== undefined && r.parent !== ROOT_NAME && !byName.has(r.parent))
    .map((r) => `${r.name} → ${r.parent ?? ''}`)
  if (missing.length > 0) {
    throw new MalformedTaxonomyError(`Missing parent lineage for ${quoteNames(missing)}`)
  }
  return byName
}

/**
 * Orders `kids` by their position in the parent's own `children` list;
 * kids the parent does not list follow in name order.
 */
function orderChildren(kids: readonly TaxonomyRecord[], listed: readonly string[] | undefined): TaxonomyRecord[] {
  const position = new Map((listed ?? []).map((name, i): [string, number] => [name, i]))
  return [...kids].sort((a, b) => {
    const pa = position.get(a.name) ?? Infinity
    const pb = position.get(b.name) ?? Infinity
    if (pa !== pb) return pa - pb
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0
  })
}

/**
 * Builds a rooted, frozen lineage tree.
 *
 * @throws {MalformedTaxonomyError} on duplicate or reserved names, a missing
 *   parent, a self-parented record, or records unreachable from the root.
 */
export function buildTree(records: readonly TaxonomyRecord[]): LineageTree {
  const byName = validateRecords(records)

  const sortedNames = [ROOT_NAME, ...byName.keys()].sort()
  const lindex = new Map(sortedNames.map((name, i): [string, number] => [name, i]))

  const kidsOf = new Map<string, TaxonomyRecord[]>()
  for (const record of records) {
    const parent = record.parent ?? ROOT_NAME
    const kids = kidsOf.get(parent)
    if (kids) kids.push(record)
    else kidsOf.set(parent, [record])
  }

  const built = new Map<string, LineageNode>()

  function buildNode(name: string, alias: string, parent: string, listed: readonly string[] | undefined): LineageNode {
    const kids = orderChildren(kidsOf.get(name) ?? [], listed)
    const children = kids.map((kid) => buildNode(kid.name, kid.alias ?? kid.name, name, kid.children))
    const node: LineageNode = Object.freeze({
      name,
      alias,
      parent,
      lindex: lindex.get(name) ?? -1,
      children: Object.freeze(children),
    })
    built.set(name, node)
    return node
  }

  const root = buildNode(ROOT_NAME, ROOT_NAME, ROOT_NAME, undefined)

  if (built.size !== sortedNames.length) {
    const unreachable = sortedNames.filter((name) => !built.has(name))
    throw new MalformedTaxonomyError(
      `Parent cycle detected: ${quoteNames(unreachable)} cannot be reached from the root`
    )
  }

  const index: LineageIndex = new Map(
    sortedNames.flatMap((name) => {
      const node = built.get(name)
      return node ? [[name, node] as const] : []
    })
  )

  return { root, index, size: sortedNames.length }
}
