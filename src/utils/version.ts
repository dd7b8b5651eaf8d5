import { existsSync, readFileSync } from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'

const __dirname = dirname(fileURLToPath(import.meta.url))
// src/utils when run from source, dist/src/utils once built
const packageJsonPath = [
  resolve(__dirname, '../../package.json'),
  resolve(__dirname, '../../../package.json'),
].find((candidate) => existsSync(candidate))

if (!packageJsonPath) {
  throw new Error(`package.json not found above ${__dirname}`)
}

const packageJson = z
  .object({ name: z.string(), version: z.string() })
  .parse(JSON.parse(readFileSync(packageJsonPath, 'utf8')))

/** Application version from package.json */
export const APP_VERSION: string = packageJson.version

/**
 * Standard User-Agent header for outbound requests
 * Format: "arrbridge/0.4.0"
 */
export const USER_AGENT = `${packageJson.name}/${APP_VERSION}`

/** Identifies this service to Plex Media Server */
export const PLEX_CLIENT_IDENTIFIER = packageJson.name
