// src/config.ts

/**
 * Centralized configuration module for environment variables.
 * Only hosts (the CLI, embedding services) import this; the validator core takes a
 * ValidatorConfig argument and never reads the environment.
 */

import dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'

// Resolve package root for both ts-jest (src) and built (dist/...) layouts
const distMarker = `${path.sep}dist${path.sep}`
const distIdx = __dirname.lastIndexOf(distMarker)
const packageRoot = distIdx !== -1 ? __dirname.slice(0, distIdx) : path.resolve(__dirname, '..')

// Try to load .env.listing-escrow from package root, with cwd fallback
const candidateEnvPaths = [
  path.join(packageRoot, '.env.listing-escrow'),
  path.join(process.cwd(), '.env.listing-escrow')
]
for (const p of candidateEnvPaths) {
  if (fs.existsSync(p)) {
    dotenv.config({ path: p })
    break
  }
}

export const ENV = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  // Comma-separated verification key hashes allowed to co-sign discounted purchases
  AUTHORIZER_KEY_HASHES: process.env.AUTHORIZER_KEY_HASHES || '',
  // Marketplace fee address as `key:<hex>` or `script:<hex>`
  FEE_PAYMENT_CREDENTIAL: process.env.FEE_PAYMENT_CREDENTIAL || '',
  FEE_STAKE_CREDENTIAL: process.env.FEE_STAKE_CREDENTIAL || '',
}
