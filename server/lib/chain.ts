import type { Chain, ChainNode, ChainSearchResult, Frontier, SearchOptions, Word, WordDictionary } from './chainTypes'

export type NodeFactory = (value: Word, parent: ChainNode | null) => ChainNode

/**
 * Returns a factory that hands out frozen nodes with ids in allocation order. One factory
 * backs one search, so ids are unique across every generation of that search's tree.
 */
export function createNodeFactory(): NodeFactory {
  let nextId = 0
  return (value, parent) => Object.freeze({ id: nextId++, value, parent })
}

/**
 * Every string obtainable from `value` by removing exactly one UTF-16 unit, in position order.
 */
export function deletions(value: Word): Word[] {
  const out: Word[] = []
  for (let i = 0; i < value.length; i++) {
    out.push(value.slice(0, i) + value.slice(i + 1))
  }
  return out
}

/**
 * The function `expandFrontier` computes the next generation of the search tree from the
 * current one.
 * @param {Frontier} frontier - The nodes of the current generation. All of them hold values of
 * the same length.
 * @param {WordDictionary} dictionary - Membership oracle; only candidates it contains survive.
 * @param {NodeFactory} createNode - Allocator for the new nodes. Pass the factory that built
 * the frontier so ids stay unique within the search.
 * @returns One node per distinct `(value, parent)` pair. A value reached from two different
 * parents yields two nodes, so separate branches are preserved.
 */
export function expandFrontier(
  frontier: Frontier,
  dictionary: WordDictionary,
  createNode: NodeFactory = createNodeFactory()
): ChainNode[] {
  const next: ChainNode[] = []
  const seen = new Set<string>()
  for (const node of frontier) {
    for (const candidate of deletions(node.value)) {
      if (!dictionary.has(candidate)) continue
      const key = `${node.id}\u0000${candidate}`
      if (seen.has(key)) continue
      seen.add(key)
      next.push(createNode(candidate, node))
    }
  }
  return next
}

/**
 * Walks parent links from `leaf` up to the root and returns the values root-first.
 */
export function reconstructPath(leaf: ChainNode): Chain {
  const path: Word[] = []
  let node: ChainNode | null = leaf
  while (node) {
    path.push(node.value)
    node = node.parent
  }
  return path.reverse()
}

export function reconstructPaths(leaves: Frontier): Chain[] {
  return leaves.map(reconstructPath)
}

/**
 * The function `searchChains` finds every longest deletion chain that starts at `input`.
 * @param {Word} input - The starting string. It does not have to be in the dictionary.
 * @param {WordDictionary} dictionary - Words each later step of a chain must belong to.
 * @param {SearchOptions} options - `onGeneration` is called for each non-empty generation,
 * starting with generation 0 which holds only the root.
 * @returns The chains ending at the nodes of the last non-empty generation. All of them have the
 * same length. When nothing can be deleted the result is `[[input]]`.
 */
export function searchChains(input: Word, dictionary: WordDictionary, options: SearchOptions = {}): Chain[] {
  const createNode = createNodeFactory()
  let frontier: Frontier = [createNode(input, null)]
  let generation = 0
  options.onGeneration?.(generation, frontier)
  // Each generation is one character shorter, so this runs at most input.length + 1 times.
  while (true) {
    const next = expandFrontier(frontier, dictionary, createNode)
    if (next.length === 0) break
    frontier = next
    generation++
    options.onGeneration?.(generation, frontier)
  }
  return reconstructPaths(frontier)
}

export function describeSearch(input: Word, dictionary: WordDictionary, options: SearchOptions = {}): ChainSearchResult {
  const chains = searchChains(input, dictionary, options)
  return {
    input,
    inDictionary: dictionary.has(input),
    depth: chains.length ? chains[0].length - 1 : 0,
    chains
  }
}
