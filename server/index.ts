import type { Server } from 'http'
import { pathToFileURL } from 'url'
import { createApp } from './app'
import { loadConfig, type ServerConfig } from './lib/config'
import { loadDictionary } from './lib/dictionary'
import { errorMessage } from './lib/errors'

/**
 * Loads the dictionary and starts listening. Rejects when the dictionary cannot be read or the
 * port cannot be bound (EADDRINUSE, EACCES), so every startup failure reaches the same handler.
 */
export async function start(config: ServerConfig = loadConfig()): Promise<Server> {
  const dictionary = await loadDictionary(config.dictionaryPath)
  console.log('[dictionary]', `Loaded ${dictionary.size} words from ${config.dictionaryPath}`)
  const app = createApp({ dictionary, config })
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(config.port)
    server.once('error', reject)
    server.once('listening', () => {
      server.off('error', reject)
      const address = server.address()
      const port = address && typeof address === 'object' ? address.port : config.port
      console.log(`Word Chain API listening on http://localhost:${port}`)
      resolve(server)
    })
  })
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  start().catch(err => {
    console.error('[startup]', errorMessage(err))
    process.exitCode = 1
  })
}
