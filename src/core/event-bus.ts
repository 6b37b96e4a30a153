import {errorMessage} from './errors.js'

export type EventHandler<TEvent> = (event: TEvent) => void | Promise<void>

type TypedEvent = {type: string}

export interface EventBus<TEvent extends TypedEvent> {
  publish(event: TEvent): void
  subscribe(handler: EventHandler<TEvent>): () => void
  on<K extends TEvent['type']>(type: K, handler: EventHandler<Extract<TEvent, {type: K}>>): () => void
}

function hasType<TEvent extends TypedEvent, K extends TEvent['type']>(
  event: TEvent,
  type: K
): event is Extract<TEvent, {type: K}> {
  return event.type === type
}

function reportHandlerError(error: unknown, event: TypedEvent): void {
  process.emitWarning(`event handler failed on '${event.type}': ${errorMessage(error)}`)
}

export class InMemoryEventBus<TEvent extends TypedEvent> implements EventBus<TEvent> {
  private readonly handlers = new Set<EventHandler<TEvent>>()
  private readonly onError: (error: unknown, event: TEvent) => void

  constructor(options: {onError?: (error: unknown, event: TEvent) => void} = {}) {
    this.onError = options.onError ?? reportHandlerError
  }

  // Handlers observe; a failing handler is reported and never reaches the publisher.
  publish(event: TEvent): void {
    for (const handler of this.handlers) {
      try {
        const result = handler(event)
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.onError(error, event))
        }
      } catch (error) {
        this.onError(error, event)
      }
    }
  }

  subscribe(handler: EventHandler<TEvent>): () => void {
    this.handlers.add(handler)
    return () => {
      this.handlers.delete(handler)
    }
  }

  on<K extends TEvent['type']>(type: K, handler: EventHandler<Extract<TEvent, {type: K}>>): () => void {
    return this.subscribe((event) => {
      if (hasType(event, type)) return handler(event)
    })
  }
}
