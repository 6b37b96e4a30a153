export class MailpilotError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Tool-call arguments rejected before any mailbox call. Reported back to the model. */
export class ValidationError extends MailpilotError {
  readonly toolName: string
  readonly issues: string[]

  constructor(toolName: string, issues: string[]) {
    super(`Invalid arguments for ${toolName}: ${issues.join('; ')}`)
    this.toolName = toolName
    this.issues = issues
  }
}

export class UnknownToolError extends MailpilotError {
  readonly toolName: string

  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`)
    this.toolName = toolName
  }
}

export class ModelEndpointError extends MailpilotError {
  readonly status?: number

  constructor(message: string, options: ErrorOptions & {status?: number} = {}) {
    super(message, {cause: options.cause})
    this.status = options.status
  }
}

export class MaxIterationsExceededError extends MailpilotError {
  readonly limit: number

  constructor(limit: number) {
    super(`Stopped after ${limit} model round-trips without a final answer.`)
    this.limit = limit
  }
}

export class ConversationStateError extends MailpilotError {}

export class ConfigurationError extends MailpilotError {
  readonly missing: string[]

  constructor(message: string, missing: string[] = []) {
    super(missing.length > 0 ? `${message} Missing: ${missing.join(', ')}` : message)
    this.missing = missing
  }
}

export type MailboxErrorKind = 'AuthenticationError' | 'NotFound' | 'RemoteServiceError'

export class MailboxOperationError extends MailpilotError {
  readonly kind: MailboxErrorKind
  readonly status?: number

  constructor(kind: MailboxErrorKind, message: string, options: ErrorOptions & {status?: number} = {}) {
    super(message, {cause: options.cause})
    this.kind = kind
    this.status = options.status
  }
}

export class AuthenticationError extends MailboxOperationError {
  constructor(message: string, options: ErrorOptions & {status?: number} = {}) {
    super('AuthenticationError', message, options)
  }
}

export class NotFoundError extends MailboxOperationError {
  constructor(message: string, options: ErrorOptions & {status?: number} = {}) {
    super('NotFound', message, options)
  }
}

export class RemoteServiceError extends MailboxOperationError {
  constructor(message: string, options: ErrorOptions & {status?: number} = {}) {
    super('RemoteServiceError', message, options)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/** Errors that end the current turn and surface to the user directly. */
export function isFatalTurnError(error: unknown): error is ModelEndpointError | MaxIterationsExceededError {
  return error instanceof ModelEndpointError || error instanceof MaxIterationsExceededError
}
