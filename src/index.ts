export { parseConfig, riverConfigSchema, ConfigValidationError, FREQUENCY_RE } from './config.js'
export type { RiverConfig, ParseConfigOptions } from './config.js'

export { ROOT_NAME } from './types.js'
export type {
  TaxonomyRecord,
  LineageNode,
  LineageIndex,
  LineageTree,
  PrevalenceVector,
  ClusterPartition,
  MetaGroup,
  Cell,
  SignalTable,
  AuxiliarySeries,
  ProjectedTable,
  Hsv,
} from './types.js'

export {
  MalformedTaxonomyError,
  UnreachableTargetSizeError,
  ShapeMismatchError,
  InvalidBinningError,
  SnapshotError,
} from './errors.js'

export { buildTree } from './tree/builder.js'
export { parseTaxonomy, loadTaxonomyFile } from './tree/taxonomy.js'
export { writeTreeSnapshot, readTreeSnapshot, loadOrBuildTree } from './tree/snapshot.js'
export type { LoadTreeOptions } from './tree/snapshot.js'
export { walkTree, descendantsOf, parentOf, ancestorsOf, isStrictAncestor } from './tree/traversal.js'

export { aggregate, computeSubtreeTotals, propagateDelta } from './clustering/aggregate.js'
export { clusterLineages, selectedNames } from './clustering/splitter.js'
export type { ClusterOptions } from './clustering/splitter.js'
export { projectClusters, clusterLabel, DEFAULT_COVERAGE_THRESHOLD } from './clustering/projector.js'
export type { ProjectOptions } from './clustering/projector.js'
export { gatherGroups } from './clustering/groups.js'

export { binAndAggregate, buildDateBins, parseFrequencyDays, baseCategory } from './signals/binning.js'
export type { SampleRow, DateBin, BinnedTable, BinningOptions } from './signals/binning.js'
export { wastewaterWeights, firstDates } from './signals/weights.js'
export type { WastewaterSample, WastewaterWeightOptions } from './signals/weights.js'
export { meanPrevalence } from './signals/table.js'

export { riverplotBaseline, shearScore } from './river/baseline.js'
export type { BaselineOptions, BaselineResult } from './river/baseline.js'
export { assignColors } from './river/colors.js'
export type { ColorOptions } from './river/colors.js'

export { summarizeRiver, summarizeSamples, LOAD_SERIES_NAME } from './pipeline.js'
export type { SummarizeRiverParams, SummarizeSamplesParams, RiverSummary } from './pipeline.js'

export { mulberry32, createRandomSource } from './utils/random.js'
export type { RandomSource } from './utils/random.js'
