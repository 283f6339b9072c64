import { bisectLeft, extent } from 'd3-array'
import type { Hsv, LineageTree } from '../types.js'
import { ShapeMismatchError } from '../errors.js'

export interface ColorOptions {
  /** Widest hue used; 0.75 keeps the last color away from wrapping to red. */
  readonly hueSpan?: number
  readonly baseValue?: number
  /** Added to `baseValue` for emphasized (inclusive) clusters. */
  readonly emphasisBonus?: number
}

const DEFAULT_HUE_SPAN = 0.75
const DEFAULT_BASE_VALUE = 0.55
const DEFAULT_EMPHASIS_BONUS = 0.25

/**
 * One HSV color per lineage name. Hue follows the alias's position in the
 * sorted aliases of the whole taxonomy, so related lineages (which share an
 * alias prefix) get neighbouring hues in every plot drawn from that tree.
 *
 * @throws {ShapeMismatchError} if a name is not in the tree or the emphasis
 *   flags are not aligned with the names.
 */
export function assignColors(
  names: readonly string[],
  emphasis: readonly boolean[],
  tree: LineageTree,
  options: ColorOptions = {},
): Hsv[] {
  if (emphasis.length !== names.length) {
    throw new ShapeMismatchError(`Got ${emphasis.length} emphasis flags for ${names.length} names`)
  }
  const hueSpan = options.hueSpan ?? DEFAULT_HUE_SPAN
  const baseValue = options.baseValue ?? DEFAULT_BASE_VALUE
  const bonus = options.emphasisBonus ?? DEFAULT_EMPHASIS_BONUS

  const aliases = Array.from(tree.index.values(), (node) => node.alias).sort()
  const ranks = names.map((name) => {
    const node = tree.index.get(name)
    if (!node) throw new ShapeMismatchError(`Cannot color unknown lineage "${name}"`)
    return bisectLeft(aliases, node.alias) ** 2
  })

  const [lo = 0, hi = 0] = extent(ranks)
  const range = hi - lo
  return ranks.map((rank, i) => ({
    hue: range > 0 ? ((rank - lo) / range) * hueSpan : 0,
    saturation: 1,
    value: emphasis[i] === true ? baseValue + bonus : baseValue,
  }))
}
