import {existsSync} from 'node:fs'
import {readFile} from 'node:fs/promises'
import {fileURLToPath} from 'node:url'
import {ConfigurationError, errorMessage} from '../core/errors.js'
import {getGlobalInstructionsPath} from './paths.js'
import type {AppConfig} from './schema.js'

export const BUNDLED_INSTRUCTIONS_PATH = fileURLToPath(new URL('../../prompts/instructions.md', import.meta.url))

/** Configured file, then the user's ~/.mailpilot copy, then the bundled default. */
export function resolveInstructionsPath(config: Pick<AppConfig, 'instructionsFile' | 'homeDir'>): string {
  if (config.instructionsFile) return config.instructionsFile
  const userCopy = getGlobalInstructionsPath(config.homeDir)
  return existsSync(userCopy) ? userCopy : BUNDLED_INSTRUCTIONS_PATH
}

export async function loadInstructions(config: Pick<AppConfig, 'instructionsFile' | 'homeDir'>): Promise<string> {
  const path = resolveInstructionsPath(config)
  try {
    return (await readFile(path, 'utf8')).trim()
  } catch (error) {
    throw new ConfigurationError(`Cannot read instructions file ${path}: ${errorMessage(error)}`)
  }
}
