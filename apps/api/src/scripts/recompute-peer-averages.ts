/**
 * Peer-average recomputation.
 *
 * Block feedback stores the peer averages known at finalization time, so
 * the first reader through a block sees the placeholder forever unless this
 * runs. Refreshes every finalized block against all other readers who have
 * since finished the same block index.
 *
 * Usage: `npm run peer-averages:recompute -w @reader-study/api`
 */
import 'dotenv/config'
import { createDatabase } from '@reader-study/db'
import { loadConfig } from '../config.js'
import { createLogger } from '../lib/logger.js'
import { createDrizzleRepositories } from '../services/drizzle-repositories.js'
import { recomputePeerAverages } from '../services/peer-averages.js'

const logger = createLogger('recompute-peer-averages')

async function main() {
  const config = loadConfig()
  const { db, pool } = createDatabase(config.databaseUrl)
  try {
    const repos = createDrizzleRepositories(db)
    const summary = await repos.transaction((tx) => recomputePeerAverages(tx, logger))
    console.log(JSON.stringify(summary, null, 2))
  } finally {
    await pool.end()
  }
}

void main().catch((error) => {
  logger.error('failed', error)
  process.exit(1)
})
