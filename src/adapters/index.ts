import type { DatabaseConfig } from '../types.js'
import type { ReceiptLedger } from './base.js'

/**
 * Factory function that creates the appropriate ledger adapter
 * based on the provided configuration.
 *
 * Adapter modules (and through them the database drivers) are dynamically
 * imported, so only the driver for the chosen database is loaded.
 */
export async function createLedger(config: DatabaseConfig): Promise<ReceiptLedger> {
  switch (config.type) {
    case 'postgres': {
      const { PostgresLedger } = await import('./postgres.js')
      return new PostgresLedger(config.url)
    }
    case 'mysql': {
      const { MysqlLedger } = await import('./mysql.js')
      return new MysqlLedger(config.url)
    }
    case 'sqlite': {
      const { SqliteLedger } = await import('./sqlite.js')
      return new SqliteLedger(config.url)
    }
    default: {
      const unsupported: never = config.type
      throw new Error(
        `Unsupported database type: "${String(unsupported)}". Supported types: postgres, mysql, sqlite`,
      )
    }
  }
}

export type { ReceiptLedger } from './base.js'
