import type {DisplayMode} from '../config/schema.js'
import {InMemoryEventBus} from '../core/event-bus.js'
import type {OrchestratorEvent} from '../core/orchestrator.js'
import {SessionLogSubscriber} from '../core/subscribers/session-log-subscriber.js'
import {UsageSubscriber} from '../core/subscribers/usage-subscriber.js'
import {dim, eventLine} from './format.js'

export type DisplaySettings = {
  mode: DisplayMode
  maxContentLength: number
}

export type ObservedBus = {
  bus: InMemoryEventBus<OrchestratorEvent>
  usage: UsageSubscriber
  display: DisplaySettings
  /** Waits for pending log writes and detaches every subscriber. */
  close(): Promise<void>
}

/** Bus with the session log, usage counters and a display printer attached. */
export function createObservedBus(display: DisplaySettings, log: (line: string) => void): ObservedBus {
  const bus = new InMemoryEventBus<OrchestratorEvent>()
  const sessionLog = new SessionLogSubscriber()
  const usage = new UsageSubscriber()
  const settings = {...display}

  const unsubscribers = [
    bus.subscribe((event) => sessionLog.handle(event)),
    bus.subscribe((event) => usage.handle(event)),
    bus.subscribe((event) => {
      const line = eventLine(event, settings.mode, settings.maxContentLength)
      if (line) log(dim(line))
    })
  ]

  return {
    bus,
    usage,
    display: settings,
    async close() {
      await sessionLog.flush()
      for (const unsubscribe of unsubscribers) unsubscribe()
    }
  }
}
