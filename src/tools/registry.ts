import type {z} from 'zod'
import {zodToJsonSchema} from 'zod-to-json-schema'
import {MailpilotError, UnknownToolError, ValidationError} from '../core/errors.js'
import {deepFreeze} from '../core/freeze.js'
import type {MailboxOperationResult, MailboxOperations} from '../mailbox/types.js'
import type {ProviderToolDefinition} from '../providers/types.js'

export type ToolDefinition = Readonly<ProviderToolDefinition>

export type PreparedCall =
  | {ok: true; execute: () => Promise<MailboxOperationResult>}
  | {ok: false; error: ValidationError}

/** A tool bound to a mailbox client. */
export interface RegisteredTool {
  readonly definition: ToolDefinition
  /** Validates arguments; the returned call is the only path to the mailbox client. */
  prepare(input: Record<string, unknown>): PreparedCall
}

export type MailboxTool = {
  readonly name: string
  readonly description: string
  bind(client: MailboxOperations): RegisteredTool
}

type ToolConfig<TSchema extends z.ZodTypeAny> = {
  name: string
  description: string
  parameters: TSchema
  handler: (client: MailboxOperations, args: z.output<TSchema>) => Promise<MailboxOperationResult>
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
}

function toInputSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const {$schema: _draft, ...jsonSchema} = zodToJsonSchema(schema, {$refStrategy: 'none'})
  return deepFreeze(jsonSchema)
}

export function defineTool<TSchema extends z.ZodTypeAny>(config: ToolConfig<TSchema>): MailboxTool {
  return {
    name: config.name,
    description: config.description,
    bind(client) {
      const definition: ToolDefinition = Object.freeze({
        name: config.name,
        description: config.description,
        inputSchema: toInputSchema(config.parameters)
      })

      return {
        definition,
        prepare(input) {
          const parsed = config.parameters.safeParse(input)
          if (!parsed.success) {
            return {ok: false, error: new ValidationError(config.name, formatIssues(parsed.error))}
          }
          const args: z.output<TSchema> = parsed.data
          return {ok: true, execute: () => config.handler(client, args)}
        }
      }
    }
  }
}

/**
 * Static lookup from tool name to schema and bound mailbox operation.
 * Built once at startup; the definition list keeps registration order.
 */
export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, RegisteredTool>
  private readonly definitions: readonly ToolDefinition[]

  constructor(tools: readonly MailboxTool[], client: MailboxOperations) {
    const bound = new Map<string, RegisteredTool>()
    for (const tool of tools) {
      if (bound.has(tool.name)) {
        throw new MailpilotError(`Tool "${tool.name}" is registered twice`)
      }
      bound.set(tool.name, tool.bind(client))
    }

    this.tools = bound
    this.definitions = Object.freeze([...bound.values()].map((tool) => tool.definition))
  }

  resolve(name: string): RegisteredTool {
    const tool = this.tools.get(name)
    if (!tool) throw new UnknownToolError(name)
    return tool
  }

  has(name: string): boolean {
    return this.tools.has(name)
  }

  listDefinitions(): readonly ToolDefinition[] {
    return this.definitions
  }

  get size(): number {
    return this.tools.size
  }
}
