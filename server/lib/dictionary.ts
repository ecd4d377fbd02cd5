import { readFile } from 'fs/promises'
import { DictionaryLoadError } from './errors'

/**
 * Splits a word list into a set, one word per line. Handles `\r\n` endings and skips blank
 * lines; nothing else about a line is changed.
 */
export function parseDictionary(text: string): Set<string> {
  return new Set(text.split(/\r?\n/).filter(Boolean))
}

/**
 * The function `loadDictionary` reads a newline-delimited word list from disk.
 * @param {string} path - Location of the word list, resolved against the working directory.
 * @returns The set of words in the file.
 * @throws DictionaryLoadError when the file cannot be read; the original error is kept as
 * `cause`.
 */
export async function loadDictionary(path: string): Promise<Set<string>> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (err) {
    throw new DictionaryLoadError(path, err)
  }
  return parseDictionary(text)
}
