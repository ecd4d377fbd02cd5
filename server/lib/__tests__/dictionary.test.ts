import { describe, it, expect } from 'vitest'
import { loadDictionary, parseDictionary } from '../dictionary'
import { DictionaryLoadError } from '../errors'
import { DEFAULT_DICTIONARY_PATH } from '../config'

describe('parseDictionary', () => {
  it('reads one word per line and skips blank lines', () => {
    const words = parseDictionary('a\r\nat\n\nsat\n')
    expect([...words]).toEqual(['a', 'at', 'sat'])
  })

  it('keeps case and inner spaces as they are', () => {
    const words = parseDictionary('Sat\nice cream\n')
    expect(words.has('Sat')).toBe(true)
    expect(words.has('sat')).toBe(false)
    expect(words.has('ice cream')).toBe(true)
  })
})

describe('loadDictionary', () => {
  it('loads the bundled word list', async () => {
    const words = await loadDictionary(DEFAULT_DICTIONARY_PATH)
    expect(words.has('starting')).toBe(true)
    expect(words.has('a')).toBe(true)
    expect(words.has('')).toBe(false)
  })

  it('wraps read failures', async () => {
    const missing = '/nonexistent/words.txt'
    const err = await loadDictionary(missing).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(DictionaryLoadError)
    if (!(err instanceof DictionaryLoadError)) return
    expect(err.path).toBe(missing)
    expect(err.name).toBe('DictionaryLoadError')
    expect(err.message.startsWith(`Could not read dictionary at ${missing}: `)).toBe(true)
    expect(err.cause).toBeInstanceOf(Error)
  })
})
