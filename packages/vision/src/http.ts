import { getLogger, TransportError, ValidationError } from '@lenslab/shared'
import type { z } from 'zod'
import type { FetchFn } from './types'

const log = getLogger('vision-http')

export type HttpMethod = 'GET' | 'POST'

export type RequestBody =
  | { kind: 'json'; value: unknown }
  | { kind: 'binary'; value: Uint8Array }

type RequestOutcome<T> =
  | { success: true; data: T }
  | { success: false; error: TransportError }

/**
 * Minimal JSON-over-HTTP transport shared by the training and prediction
 * clients. Every failure surfaces as a TransportError; nothing is retried.
 */
export class RestTransport {
  private baseUrl: string
  private headers: Record<string, string>
  private fetchFn: FetchFn

  constructor(
    baseUrl: string,
    headers: Record<string, string>,
    fetchFn: FetchFn = fetch,
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '')
    this.headers = headers
    this.fetchFn = fetchFn
  }

  async request<T>(
    path: string,
    method: HttpMethod,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: RequestBody,
  ): Promise<T> {
    const result = await this.doRequest(path, method, schema, body)
    if (!result.success) {
      throw result.error
    }
    return result.data
  }

  private async doRequest<T>(
    path: string,
    method: HttpMethod,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: RequestBody,
  ): Promise<RequestOutcome<T>> {
    const url = `${this.baseUrl}${path}`
    const headers: Record<string, string> = { ...this.headers }
    const init: RequestInit = { method, headers }

    if (body?.kind === 'json') {
      headers['Content-Type'] = 'application/json'
      init.body = JSON.stringify(body.value)
    } else if (body?.kind === 'binary') {
      headers['Content-Type'] = 'application/octet-stream'
      init.body = body.value
    }

    log.debug('Request', { method, path })

    const response = await this.fetchFn(url, init).catch((err: unknown) => {
      return { error: err } as const
    })

    if ('error' in response) {
      const reason =
        response.error instanceof Error
          ? response.error.message
          : String(response.error)
      return {
        success: false,
        error: new TransportError(`Network error: ${reason}`, {
          cause: response.error,
        }),
      }
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => 'Unknown error')
      return {
        success: false,
        error: new TransportError(
          `${method} ${path} failed: ${response.status} ${errorText}`,
          { statusCode: response.status },
        ),
      }
    }

    const payload: unknown = await response.json().catch((err: unknown) => {
      return new TransportError(`${method} ${path} returned invalid JSON`, {
        statusCode: response.status,
        cause: err,
      })
    })
    if (payload instanceof TransportError) {
      return { success: false, error: payload }
    }

    const parsed = schema.safeParse(payload)
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join(', ')
      return {
        success: false,
        error: new TransportError(
          `${method} ${path} returned an unexpected body: ${issues}`,
          {
            statusCode: response.status,
            cause: new ValidationError(issues),
          },
        ),
      }
    }

    return { success: true, data: parsed.data }
  }
}
