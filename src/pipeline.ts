/**
 * pipeline.ts — One call from a lineage signal table to everything a river
 * plot renderer needs: clustered columns, legend groups, colors, baseline.
 */

import type { Cell, ClusterPartition, Hsv, LineageTree, MetaGroup, PrevalenceVector, ProjectedTable, SignalTable } from './types.js'
import type { RiverConfig } from './config.js'
import { clusterLineages } from './clustering/splitter.js'
import { projectClusters } from './clustering/projector.js'
import { gatherGroups } from './clustering/groups.js'
import { meanPrevalence } from './signals/table.js'
import { binAndAggregate, type SampleRow } from './signals/binning.js'
import { wastewaterWeights, type WastewaterSample } from './signals/weights.js'
import { riverplotBaseline, type BaselineResult } from './river/baseline.js'
import { assignColors } from './river/colors.js'
import { createRandomSource, type RandomSource } from './utils/random.js'

/** Name of the auxiliary column that carries per-row loads. */
export const LOAD_SERIES_NAME = 'load'

export interface SummarizeRiverParams {
  readonly tree: LineageTree
  /** Rows are dates or bins, columns are lineage names. */
  readonly signal: SignalTable
  /** Per-row load (e.g. viral load) keyed by row key. Enables the baseline. */
  readonly loads?: ReadonlyMap<string, Cell>
  readonly config: RiverConfig
  /** Overrides `config.baseline.seed`. */
  readonly rng?: RandomSource
}

export interface SummarizeSamplesParams extends Omit<SummarizeRiverParams, 'signal'> {
  /** Long-format lineage measurements with their sewershed metadata. */
  readonly samples: readonly (SampleRow & WastewaterSample)[]
  /** Default: earliest sample date. */
  readonly startDate?: string
  /** Default: latest sample date. */
  readonly endDate?: string
}

export interface RiverSummary {
  /** The snapshot the clusters were chosen on. */
  readonly representative: PrevalenceVector
  readonly partition: ClusterPartition
  readonly table: ProjectedTable
  /** Legend groups, by anchor alias descending. */
  readonly groups: readonly MetaGroup[]
  /** One color per column of `table`. */
  readonly colors: readonly Hsv[]
  /** null when no loads were given. */
  readonly baseline: BaselineResult | null
}

export function summarizeRiver(params: SummarizeRiverParams): RiverSummary {
  const { tree, signal, loads, config } = params

  let targetSize = config.clustering.targetSize
  if (targetSize > tree.size) {
    console.warn(
      `[river] pipeline: targetSize ${targetSize} exceeds the ${tree.size} lineages in the tree; using ${tree.size}`
    )
    targetSize = tree.size
  }

  const representative = meanPrevalence(signal)
  const partition = clusterLineages(tree, representative, targetSize, config.clustering.alpha, {
    maxIterations: config.clustering.maxIterations,
  })
  const table = projectClusters(signal, partition, tree, {
    coverageThreshold: config.projection.coverageThreshold,
    ...(loads !== undefined ? { auxiliary: { name: LOAD_SERIES_NAME, values: loads } } : {}),
  })
  const groups = gatherGroups(partition, representative, config.groups.countScores)
  const colors = assignColors(table.names, table.inclusive, tree, config.colors)

  const baseline = table.auxiliary !== undefined
    ? riverplotBaseline(table, table.auxiliary.values, {
        iterations: config.baseline.iterations,
        rng: params.rng ?? createRandomSource(config.baseline.seed),
      })
    : null

  return { representative, partition, table, groups, colors, baseline }
}

/**
 * Weights and bins raw samples per `config.weights` and `config.binning`,
 * then summarizes the binned table. Row keys, and so the keys of `loads`,
 * are bin end dates.
 */
export function summarizeSamples(params: SummarizeSamplesParams): RiverSummary {
  const { samples, config, startDate, endDate } = params
  const signal = binAndAggregate(samples, {
    weights: wastewaterWeights(samples, config.weights),
    frequency: config.binning.frequency,
    column: config.binning.column,
    normalize: config.binning.normalize,
    startDate,
    endDate,
  })
  return summarizeRiver({ tree: params.tree, signal, loads: params.loads, config, rng: params.rng })
}
