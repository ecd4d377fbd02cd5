export type Word = string

/**
 * Membership oracle consulted by the search. Any `ReadonlySet<string>` fits.
 */
export interface WordDictionary {
  has(word: Word): boolean
}

/**
 * One string reached during a search, linked back to the node it was derived from.
 *
 * @property id - Allocation index within a single search; the root is always 0.
 * @property parent - The node this value was produced from by a one-character deletion, or
 * `null` for the root.
 */
export interface ChainNode {
  readonly id: number
  readonly value: Word
  readonly parent: ChainNode | null
}

export type Frontier = readonly ChainNode[]

export type Chain = Word[]

export interface SearchOptions {
  onGeneration?: (generation: number, frontier: Frontier) => void
}

/**
 * Summary returned by the API and the streaming endpoint.
 *
 * @property inDictionary - Whether the input itself is a dictionary word. Informational only.
 * @property depth - Number of deletions in every returned chain.
 */
export interface ChainSearchResult {
  input: Word
  inDictionary: boolean
  depth: number
  chains: Chain[]
}
