/**
 * Typed error classes for lineage-river.
 *
 * Callers distinguish failure categories by class rather than by parsing
 * messages. Numerical edge cases (zero weight, empty subtree, low coverage)
 * are never raised as errors; they surface as `null` or `NaN` values.
 */

export class MalformedTaxonomyError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedTaxonomyError'
  }
}

export class UnreachableTargetSizeError extends Error {
  readonly targetSize: number
  readonly treeSize: number

  constructor(targetSize: number, treeSize: number) {
    super(`Cannot select ${targetSize} clusters from a tree of ${treeSize} lineages`)
    this.name = 'UnreachableTargetSizeError'
    this.targetSize = targetSize
    this.treeSize = treeSize
  }
}

export class ShapeMismatchError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ShapeMismatchError'
  }
}

export class InvalidBinningError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidBinningError'
  }
}

export class SnapshotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SnapshotError'
  }
}
