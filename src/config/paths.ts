import {homedir} from 'node:os'
import {resolve} from 'node:path'

export function getMailpilotHome(): string {
  const custom = process.env.MAILPILOT_HOME?.trim()
  if (custom) return resolve(custom)
  return resolve(homedir(), '.mailpilot')
}

export function getGlobalEnvPath(homeDir = getMailpilotHome()): string {
  return resolve(homeDir, '.env')
}

export function getGlobalInstructionsPath(homeDir = getMailpilotHome()): string {
  return resolve(homeDir, 'instructions.md')
}

export function getLogsDir(homeDir = getMailpilotHome()): string {
  return resolve(homeDir, 'logs')
}

export function getSessionLogPath(sessionId: string, homeDir = getMailpilotHome()): string {
  return resolve(getLogsDir(homeDir), `${sessionId}.jsonl`)
}
