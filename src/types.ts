/**
 * Core types for lineage-river.
 * Trees and everything derived from them are immutable (readonly where appropriate).
 */

// ---------------------------------------------------------------------------
// Taxonomy
// ---------------------------------------------------------------------------

/** Name of the synthetic root that every parentless lineage hangs from. */
export const ROOT_NAME = '*'

/** One entry of the flat taxonomy document, before the tree is built. */
export interface TaxonomyRecord {
  readonly name: string
  /** Absent for top-level lineages, which become children of the synthetic root. */
  readonly parent?: string
  readonly alias?: string
  /** Child names as listed by the taxonomy; used only to order children. */
  readonly children?: readonly string[]
}

/** A lineage in the built tree. Frozen after construction. */
export interface LineageNode {
  readonly name: string
  readonly alias: string
  /** Parent name; the synthetic root is its own parent. */
  readonly parent: string
  /** Dense index in `[0, tree.size)`, stable for the lifetime of one tree. */
  readonly lindex: number
  readonly children: readonly LineageNode[]
}

/** Name → node, iterated in name order. */
export type LineageIndex = ReadonlyMap<string, LineageNode>

export interface LineageTree {
  readonly root: LineageNode
  readonly index: LineageIndex
  /** Number of nodes, synthetic root included. */
  readonly size: number
}

// ---------------------------------------------------------------------------
// Prevalence & clustering
// ---------------------------------------------------------------------------

/** Sparse lineage → prevalence mapping; absent names count as 0. */
export type PrevalenceVector = ReadonlyMap<string, number>

/**
 * A selection of representative nodes.
 * `inclusive` (U) buckets hold their full subtree; `exclusive` (V) buckets
 * hold their subtree minus the subtrees of selected descendants.
 */
export interface ClusterPartition {
  readonly inclusive: readonly LineageNode[]
  readonly exclusive: readonly LineageNode[]
}

/** A legend group: an anchor node plus the selected nodes nested under it. */
export interface MetaGroup {
  readonly anchor: LineageNode
  /** Anchor and nested members, sorted by ascending alias. */
  readonly members: readonly LineageNode[]
}

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

/** A cell value; `null` marks a missing observation. */
export type Cell = number | null

/** A row-keyed numeric table (rows are dates or date bins). */
export interface SignalTable {
  readonly rowKeys: readonly string[]
  readonly columns: readonly string[]
  readonly rows: readonly (readonly Cell[])[]
}

/** A non-aggregated series carried alongside a table, keyed by row key. */
export interface AuxiliarySeries {
  readonly name: string
  readonly values: ReadonlyMap<string, Cell>
}

/** Output of the cluster projector. Columns are cluster labels. */
export interface ProjectedTable extends SignalTable {
  /** Lineage name of each column's root node, in column order. */
  readonly names: readonly string[]
  /** True where the column's root is inclusive (U). */
  readonly inclusive: readonly boolean[]
  readonly auxiliary?: {
    readonly name: string
    readonly values: readonly Cell[]
  }
}

/** A colour in HSV space, each channel in `[0, 1]`. */
export interface Hsv {
  readonly hue: number
  readonly saturation: number
  readonly value: number
}
