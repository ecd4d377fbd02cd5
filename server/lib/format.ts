import type { Chain } from './chainTypes'

export const DEFAULT_SEPARATOR = ' => '

export function formatChain(chain: Chain, separator: string = DEFAULT_SEPARATOR): string {
  return chain.join(separator)
}

// One line per chain; order among equal-length chains carries no meaning.
export function formatChains(chains: Chain[], separator: string = DEFAULT_SEPARATOR): string[] {
  return chains.map(chain => formatChain(chain, separator))
}
