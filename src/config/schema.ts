import {z} from 'zod'
import {getMailpilotHome} from './paths.js'

const positiveInt = z.coerce.number().int().positive()

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
)

export const displayModes = ['clean', 'verbose', 'debug'] as const
export type DisplayMode = (typeof displayModes)[number]

export const appConfigSchema = z.object({
  provider: z.enum(['mock', 'openai']).default('openai'),
  model: optionalString,
  baseURL: optionalString,
  homeDir: z.string().default(getMailpilotHome()),
  instructionsFile: optionalString,
  runtime: z
    .object({
      modelTimeoutMs: positiveInt.default(45_000),
      maxIterations: positiveInt.default(10)
    })
    .default({}),
  mailbox: z
    .object({
      userId: optionalString,
      tenantId: optionalString,
      clientId: optionalString,
      clientSecret: optionalString,
      scope: z.string().default('https://graph.microsoft.com/.default'),
      graphBaseUrl: z.string().url().default('https://graph.microsoft.com/v1.0'),
      authorityHost: z.string().url().default('https://login.microsoftonline.com'),
      requestTimeoutMs: positiveInt.default(30_000)
    })
    .default({}),
  display: z
    .object({
      mode: z.enum(displayModes).default('verbose'),
      maxContentLength: positiveInt.default(500)
    })
    .default({})
})

export type AppConfig = z.infer<typeof appConfigSchema>
