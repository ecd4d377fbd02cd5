import { pathToFileURL } from 'url'
import { searchChains } from './lib/chain'
import { loadDictionary } from './lib/dictionary'
import { formatChains } from './lib/format'
import { errorMessage } from './lib/errors'

export const USAGE = `Please provide two positional arguments, the path to the dictionary file and the string
input. E.g. chain ./dictionary.txt starting`

export const NOT_IN_DICTIONARY = 'Input word is not in the dictionary. Continuing with substrings.'

export interface CliIO {
  out: (line: string) => void
  err: (line: string) => void
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line)
}

/**
 * Runs the word chain tool for `chain <dictionary-file> <word>` and returns the exit code:
 * 0 on success, 1 when the dictionary cannot be read, 2 on bad arguments.
 */
export async function runCli(argv: string[], io: CliIO = consoleIO): Promise<number> {
  if (argv.length !== 2) {
    io.err(USAGE)
    return 2
  }
  const [dictionaryFile, input] = argv

  let dictionary: Set<string>
  try {
    dictionary = await loadDictionary(dictionaryFile)
  } catch (err) {
    io.err(`Failed to load dictionary: ${errorMessage(err)}`)
    return 1
  }

  if (!dictionary.has(input)) io.err(NOT_IN_DICTIONARY)

  for (const line of formatChains(searchChains(input, dictionary))) io.out(line)
  return 0
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runCli(process.argv.slice(2))
    .then(code => { process.exitCode = code })
    .catch(err => {
      console.error(errorMessage(err))
      process.exitCode = 1
    })
}
