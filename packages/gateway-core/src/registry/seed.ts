import { readFile } from 'node:fs/promises'
import { ConfigurationError } from '../errors'
import { InMemoryRegistry } from './memory-registry'
import { seedSchema } from './schemas'

/** Builds an in-memory registry from a JSON seed file (BRIDGE_SEED_FILE). */
export async function loadSeedFile(path: string): Promise<InMemoryRegistry> {
  let raw: unknown
  try {
    raw = JSON.parse(await readFile(path, 'utf8'))
  } catch (err) {
    throw new ConfigurationError(`Cannot read seed file ${path}`, { cause: err })
  }
  const parsed = seedSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new ConfigurationError(`Invalid seed file ${path}: ${issues}`)
  }
  return InMemoryRegistry.fromSeed(parsed.data)
}
