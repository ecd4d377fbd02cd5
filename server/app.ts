import express, { type ErrorRequestHandler, type Express } from 'express'
import cors from 'cors'
import { createHash } from 'crypto'
import { describeSearch } from './lib/chain'
import { formatChains } from './lib/format'
import { errorMessage } from './lib/errors'
import type { ServerConfig } from './lib/config'
import type { ChainSearchResult, WordDictionary } from './lib/chainTypes'

export interface AppOptions {
  dictionary: ReadonlySet<string>
  config: Pick<ServerConfig, 'corsOrigin' | 'wordlistsVersion' | 'maxWordLength'>
}

/**
 * The type `ChainResponse` is the body of `/api/chain`.
 * @property {string[]} lines - Each chain joined with ` => `, ready to print.
 * @property {string} error - Present only when `success` is false.
 */
type ChainResponse =
  | (ChainSearchResult & { success: true; lines: string[] })
  | { success: false; error: string }

type WordCheck = { ok: true; word: string } | { ok: false; error: string }

function checkWord(raw: unknown, maxWordLength: number): WordCheck {
  if (Array.isArray(raw)) return { ok: false, error: '"word" must be a single string' }
  if (typeof raw !== 'string') return { ok: false, error: 'Missing "word" parameter' }
  if (raw.length > maxWordLength) {
    return { ok: false, error: `Word exceeds maximum length of ${maxWordLength}` }
  }
  return { ok: true, word: raw }
}

/**
 * Builds the Express app around a dictionary that stays loaded for the life of the process.
 * Every request runs its own search against the same read-only set.
 */
export function createApp({ dictionary, config }: AppOptions): Express {
  const app = express()
  app.use(cors({ origin: config.corsOrigin }))
  app.use(express.json())

  const words: WordDictionary = dictionary
  const dictionaryText = [...dictionary].sort().join('\n')
  const dictionarySha = createHash('sha256').update(dictionaryText).digest('hex')

  const runChain = (raw: unknown): { status: number; body: ChainResponse } => {
    const checked = checkWord(raw, config.maxWordLength)
    if (!checked.ok) return { status: 400, body: { success: false, error: checked.error } }
    const result = describeSearch(checked.word, words)
    if (!result.inDictionary) {
      console.warn('[chain]', `"${checked.word}" is not in the dictionary, continuing with substrings`)
    }
    return { status: 200, body: { success: true, ...result, lines: formatChains(result.chains) } }
  }

  // Simple health check for uptime pings and client readiness
  app.get('/api/health', (_req, res) => {
    res.json({ ok: true, service: 'word-chain', timestamp: Date.now() })
  })

  app.get('/api/chain', (req, res) => {
    const { status, body } = runChain(req.query.word)
    res.status(status).json(body)
  })

  app.post('/api/chain', (req, res) => {
    const payload: unknown = req.body
    const raw = payload && typeof payload === 'object' && 'word' in payload ? payload.word : undefined
    const { status, body } = runChain(raw)
    res.status(status).json(body)
  })

  // Streaming (SSE) search: one event per generation, then the final chains
  app.get('/api/chain-sse', (req, res) => {
    res.setHeader('Content-Type', 'text/event-stream')
    res.setHeader('Cache-Control', 'no-cache, no-transform')
    res.setHeader('Connection', 'keep-alive')
    res.flushHeaders()

    const send = (event: string, data: unknown) => {
      res.write(`event: ${event}\n`)
      res.write(`data: ${JSON.stringify(data)}\n\n`)
    }

    const checked = checkWord(req.query.word, config.maxWordLength)
    if (!checked.ok) {
      send('error', { message: checked.error })
      res.end()
      return
    }

    const input = checked.word
    try {
      send('init', { input, inDictionary: words.has(input) })
      const result = describeSearch(input, words, {
        onGeneration: (generation, frontier) => {
          const distinct = [...new Set(frontier.map(node => node.value))]
          send('generation', { generation, size: frontier.length, words: distinct })
        }
      })
      console.log('[SSE]', `"${input}" resolved to ${result.chains.length} chain(s) of depth ${result.depth}`)
      send('complete', result)
    } catch (err) {
      console.error('[SSE]', err)
      send('error', { message: errorMessage(err) })
    }
    res.end()
  })

  // Canonical word list endpoints, as loaded at startup
  app.get('/wordlists/dictionary.txt', (_req, res) => {
    res.setHeader('Cache-Control', 'public, max-age=86400, s-maxage=86400')
    res.type('text/plain').send(dictionaryText)
  })

  app.get('/wordlists/meta.json', (_req, res) => {
    res.setHeader('Cache-Control', 'public, max-age=3600, s-maxage=3600')
    res.json({
      version: config.wordlistsVersion,
      dictionary: { count: dictionary.size, sha256: dictionarySha },
      generatedAt: Date.now()
    })
  })

  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    // body-parser marks malformed JSON with a 4xx status
    const status = typeof err?.status === 'number' ? err.status : 500
    if (status >= 500) console.error('[chain]', err)
    res.status(status).json({ success: false, error: errorMessage(err) })
  }
  app.use(onError)

  return app
}
