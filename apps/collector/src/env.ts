/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads .env.local from the working directory outside production.
 * Production injects env vars directly.
 */
import { config } from 'dotenv'
import { resolve } from 'node:path'

if (process.env.NODE_ENV !== 'production') {
  config({ path: resolve(process.cwd(), '.env.local') })
}
