import {z} from 'zod'
import {AuthenticationError, errorMessage} from '../core/errors.js'

export interface TokenProvider {
  getToken(): Promise<string>
}

export type ClientCredentials = {
  tenantId: string
  clientId: string
  clientSecret: string
  scope: string
  authorityHost?: string
  timeoutMs?: number
}

const REFRESH_MARGIN_MS = 60_000

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive().default(3600)
})

function describeTokenError(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body)
    if (typeof parsed === 'object' && parsed !== null) {
      const description = 'error_description' in parsed ? parsed.error_description : undefined
      const code = 'error' in parsed ? parsed.error : undefined
      if (typeof description === 'string' && description) return description
      if (typeof code === 'string' && code) return code
    }
  } catch {
    // not JSON; fall through to the raw body
  }
  return body.slice(0, 200) || '(empty response)'
}

/**
 * OAuth2 client-credentials exchange against the Microsoft identity platform.
 * Tokens are cached until shortly before they expire.
 */
export class ClientCredentialsTokenProvider implements TokenProvider {
  private readonly credentials: ClientCredentials
  private readonly now: () => number
  private cached?: {token: string; expiresAt: number}

  constructor(credentials: ClientCredentials, now: () => number = Date.now) {
    this.credentials = credentials
    this.now = now
  }

  get tokenUrl(): string {
    const authority = (this.credentials.authorityHost ?? 'https://login.microsoftonline.com').replace(/\/+$/, '')
    return `${authority}/${encodeURIComponent(this.credentials.tenantId)}/oauth2/v2.0/token`
  }

  async getToken(): Promise<string> {
    if (this.cached && this.now() < this.cached.expiresAt - REFRESH_MARGIN_MS) {
      return this.cached.token
    }

    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
      scope: this.credentials.scope
    })

    let response: Response
    let text: string
    try {
      response = await fetch(this.tokenUrl, {
        method: 'POST',
        headers: {'Content-Type': 'application/x-www-form-urlencoded'},
        body,
        signal: AbortSignal.timeout(this.credentials.timeoutMs ?? 30_000)
      })
      text = await response.text()
    } catch (error) {
      throw new AuthenticationError(`Token request failed: ${errorMessage(error)}`, {cause: error})
    }

    if (!response.ok) {
      throw new AuthenticationError(`Token request rejected (${response.status}): ${describeTokenError(text)}`, {
        status: response.status
      })
    }

    let payload: unknown
    try {
      payload = JSON.parse(text)
    } catch (error) {
      throw new AuthenticationError('Token endpoint returned a non-JSON body', {cause: error})
    }

    const parsed = tokenResponseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new AuthenticationError('Token endpoint response has no access_token')
    }

    this.cached = {
      token: parsed.data.access_token,
      expiresAt: this.now() + parsed.data.expires_in * 1000
    }
    return parsed.data.access_token
  }
}
