/**
 * snapshot.ts — Persists a built lineage tree as gzip-compressed JSON so the
 * taxonomy does not have to be fetched and rebuilt on every run.
 *
 * The snapshot format is private to this package and versioned; a snapshot
 * with an unknown version is treated as corrupt and rebuilt.
 */

import { gunzipSync, gzipSync } from 'node:zlib'
import { z } from 'zod'
import { ROOT_NAME } from '../types.js'
import type { LineageNode, LineageTree } from '../types.js'
import { SnapshotError } from '../errors.js'
import { describeIssues } from '../error-utils.js'
import { atomicWrite, readBytesOrNull } from '../utils/fs.js'
import { buildTree } from './builder.js'
import { loadTaxonomyFile } from './taxonomy.js'
import { walkTree } from './traversal.js'

const SNAPSHOT_VERSION = 1

interface SnapshotNode {
  name: string
  alias: string
  parent: string
  lindex: number
  children: SnapshotNode[]
}

const snapshotNodeSchema: z.ZodType<SnapshotNode> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    alias: z.string().min(1),
    parent: z.string().min(1),
    lindex: z.number().int().min(0),
    children: z.array(snapshotNodeSchema),
  })
)

const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  root: snapshotNodeSchema,
})

function freezeNode(node: SnapshotNode): LineageNode {
  return Object.freeze({
    name: node.name,
    alias: node.alias,
    parent: node.parent,
    lindex: node.lindex,
    children: Object.freeze(node.children.map(freezeNode)),
  })
}

function checkParentLinks(root: LineageNode): void {
  if (root.name !== ROOT_NAME || root.parent !== root.name) {
    throw new SnapshotError(
      `Snapshot root must be "${ROOT_NAME}" and its own parent, got "${root.name}" → "${root.parent}"`
    )
  }
  for (const node of walkTree(root)) {
    for (const child of node.children) {
      if (child.parent !== node.name) {
        throw new SnapshotError(
          `Snapshot nests "${child.name}" under "${node.name}" but records its parent as "${child.parent}"`
        )
      }
    }
  }
}

function treeFromRoot(root: LineageNode): LineageTree {
  checkParentLinks(root)
  const nodes = walkTree(root)
  const byName = new Map<string, LineageNode>()
  const seenIndices = new Set<number>()
  for (const node of nodes) {
    if (byName.has(node.name)) throw new SnapshotError(`Snapshot repeats lineage "${node.name}"`)
    if (node.lindex >= nodes.length || seenIndices.has(node.lindex)) {
      throw new SnapshotError(`Snapshot has an invalid lindex ${node.lindex} for "${node.name}"`)
    }
    byName.set(node.name, node)
    seenIndices.add(node.lindex)
  }
  const names = [...byName.keys()].sort()
  const index = new Map(names.flatMap((name) => {
    const node = byName.get(name)
    return node ? [[name, node] as const] : []
  }))
  return { root, index, size: nodes.length }
}

/**
 * Writes `tree` to `filePath` as gzip-compressed JSON (atomic replace).
 * The caller is responsible for ensuring the target directory exists.
 */
export async function writeTreeSnapshot(tree: LineageTree, filePath: string): Promise<void> {
  const json = JSON.stringify({ version: SNAPSHOT_VERSION, root: tree.root })
  await atomicWrite(filePath, gzipSync(Buffer.from(json, 'utf-8')))
}

/**
 * Reads a snapshot written by {@link writeTreeSnapshot}.
 * Returns null if the file does not exist.
 *
 * @throws {SnapshotError} if the file cannot be decompressed, decoded or validated.
 */
export async function readTreeSnapshot(filePath: string): Promise<LineageTree | null> {
  const bytes = await readBytesOrNull(filePath)
  if (bytes === null) return null

  let decoded: unknown
  try {
    decoded = JSON.parse(gunzipSync(bytes).toString('utf-8'))
  } catch (err) {
    throw new SnapshotError(`Tree snapshot ${filePath} is unreadable`, { cause: err })
  }

  const result = snapshotSchema.safeParse(decoded)
  if (!result.success) {
    throw new SnapshotError(describeIssues(`Tree snapshot ${filePath} failed validation:`, result.error))
  }
  return treeFromRoot(freezeNode(result.data.root))
}

export interface LoadTreeOptions {
  readonly taxonomyPath: string
  readonly snapshotPath: string
}

/**
 * Returns the tree from its snapshot when one exists and is valid; otherwise
 * builds it from the taxonomy file and persists a fresh snapshot.
 * A snapshot that cannot be written is logged, and the built tree is still returned.
 *
 * @throws {MalformedTaxonomyError} if the tree has to be rebuilt and the taxonomy is invalid.
 */
export async function loadOrBuildTree(options: LoadTreeOptions): Promise<LineageTree> {
  try {
    const cached = await readTreeSnapshot(options.snapshotPath)
    if (cached !== null) return cached
  } catch (err) {
    if (!(err instanceof SnapshotError)) throw err
    console.error('[river] tree-snapshot: snapshot is corrupt, rebuilding from taxonomy:', err.message)
  }

  const tree = buildTree(await loadTaxonomyFile(options.taxonomyPath))
  try {
    await writeTreeSnapshot(tree, options.snapshotPath)
  } catch (err) {
    console.error('[river] tree-snapshot: could not persist snapshot (built tree still returned):', err)
  }
  return tree
}
