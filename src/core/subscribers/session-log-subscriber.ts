import {appendFile, mkdir} from 'node:fs/promises'
import {dirname} from 'node:path'
import {errorMessage} from '../errors.js'
import type {OrchestratorEvent} from '../orchestrator.js'

type SessionLogRecord = {
  ts: string
  type: string
  [key: string]: unknown
}

export type SessionLogSubscriberOptions = {
  /** Called when a record cannot be written; the session keeps running. */
  onWriteError?: (error: unknown, logPath: string) => void
}

function warnWriteFailure(error: unknown, logPath: string): void {
  process.emitWarning(`session log ${logPath} not written: ${errorMessage(error)}`)
}

/**
 * Appends every orchestrator event of a session to its JSONL diagnostics file.
 * The path is announced by `session_start`; events of unknown sessions are ignored.
 */
export class SessionLogSubscriber {
  private readonly logPaths = new Map<string, string>()
  private readonly pendingBySession = new Map<string, Promise<void>>()
  private readonly onWriteError: (error: unknown, logPath: string) => void

  constructor(options: SessionLogSubscriberOptions = {}) {
    this.onWriteError = options.onWriteError ?? warnWriteFailure
  }

  async handle(event: OrchestratorEvent): Promise<void> {
    if (event.type === 'session_start' && event.logPath) {
      this.logPaths.set(event.sessionId, event.logPath)
    }

    const {type, sessionId, ...fields} = event
    await this.append(sessionId, {ts: new Date().toISOString(), type, ...fields})

    if (event.type === 'session_end') {
      this.logPaths.delete(sessionId)
    }
  }

  private async append(sessionId: string, record: SessionLogRecord): Promise<void> {
    const logPath = this.logPaths.get(sessionId)
    if (!logPath) return
    const previous = this.pendingBySession.get(sessionId) ?? Promise.resolve()
    const next = previous.then(async () => {
      try {
        await mkdir(dirname(logPath), {recursive: true})
        await appendFile(logPath, `${JSON.stringify(record)}\n`, 'utf8')
      } catch (error) {
        this.onWriteError(error, logPath)
      }
    })
    this.pendingBySession.set(sessionId, next)
    await next
  }

  async flush(): Promise<void> {
    await Promise.all(this.pendingBySession.values())
    this.pendingBySession.clear()
  }
}
