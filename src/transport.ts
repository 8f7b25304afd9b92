import { setTimeout as sleep } from 'node:timers/promises'
import axios, { type AxiosInstance } from 'axios'
import { AuthBlocked, TimeoutError, TransportFailure, toThermostatError } from './errors.js'
import createLogger from './logger.js'
import { fromWireParams, type RawTelegram, type WireParam } from './telegram/codec.js'

const logger = createLogger('transport')

// Configuration constants
const API_ENDPOINT = '/api.cgi'
const MAINTENANCE_ENDPOINT = '/test.cgi'
const CMD_READ_PARAMETERS = 1
const CMD_READ_STATUS = 4
const DEFAULT_TIMEOUT_MS = 5_000 // Connect + response deadline per request
const DEFAULT_MIN_REQUEST_GAP_MS = 1_000 // The device drops requests that arrive back to back

const BLOCKED_REPLY_PATTERN = /lan.?block|blocked|denied|forbidden|unauthori[sz]ed/i

export interface TransportOptions {
  host: string
  serialNumber: string
  timeoutMs?: number
  minRequestGapMs?: number
}

/**
 * One request/response exchange with the device per call. Callers are
 * responsible for serialising calls; see SerialQueue.
 */
export interface Transport {
  readParameters(): Promise<RawTelegram>
  readStatus(): Promise<Record<string, unknown>>
  writeParameters(params: WireParam[]): Promise<void>
  restart(): Promise<void>
  abortAll(): void
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

function isBlockedReply(reply: Record<string, unknown>): boolean {
  const text = [reply.status, reply.message, reply.error].filter((part) => typeof part === 'string').join(' ')
  return text !== '' && BLOCKED_REPLY_PATTERN.test(text)
}

export class HttpTransport implements Transport {
  private readonly client: AxiosInstance
  private readonly serialNumber: string
  private readonly minRequestGapMs: number
  private readonly inFlight = new Set<AbortController>()
  private lastRequestAt = 0

  constructor(options: TransportOptions) {
    this.serialNumber = options.serialNumber
    this.minRequestGapMs = options.minRequestGapMs ?? DEFAULT_MIN_REQUEST_GAP_MS
    this.client = axios.create({
      baseURL: `http://${options.host}`,
      headers: {
        'Content-Type': 'application/json',
      },
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    })
  }

  public async readParameters(): Promise<RawTelegram> {
    const reply = await this.post(API_ENDPOINT, { cmd: CMD_READ_PARAMETERS, sn: this.serialNumber })
    return fromWireParams(reply)
  }

  public async readStatus(): Promise<Record<string, unknown>> {
    return this.post(API_ENDPOINT, { cmd: CMD_READ_STATUS, sn: this.serialNumber })
  }

  public async writeParameters(params: WireParam[]): Promise<void> {
    const reply = await this.post(API_ENDPOINT, { sn: this.serialNumber, par: params })
    if (reply.success === 'false' || reply.success === false) {
      throw new TransportFailure(`Device rejected the parameter write: ${JSON.stringify(reply)}`)
    }
  }

  public async restart(): Promise<void> {
    const reply = await this.post(MAINTENANCE_ENDPOINT, { cmd: 'restart' })
    if (reply.success !== 'true' && reply.success !== true) {
      throw new TransportFailure(`Device did not confirm the restart: ${JSON.stringify(reply)}`)
    }
    logger.info('Restart command acknowledged')
  }

  /**
   * Abort every request still waiting on the device
   */
  public abortAll(): void {
    for (const controller of this.inFlight) {
      controller.abort()
    }
    this.inFlight.clear()
  }

  private async post(endpoint: string, body: Record<string, unknown>): Promise<Record<string, unknown>> {
    const controller = new AbortController()
    this.inFlight.add(controller)
    try {
      const wait = this.lastRequestAt + this.minRequestGapMs - Date.now()
      if (wait > 0) {
        await sleep(wait, undefined, { signal: controller.signal })
      }

      logger.debug('POST', endpoint, body)
      this.lastRequestAt = Date.now()
      const response = await this.client.post<unknown>(endpoint, body, { signal: controller.signal })
      const reply = response.data
      if (!isRecord(reply)) {
        throw new TransportFailure(`Unexpected reply from ${endpoint}: ${JSON.stringify(reply)}`)
      }
      if (reply.status === 'timeout') {
        throw new TimeoutError(`Device reported a timeout for ${endpoint}`)
      }
      if (isBlockedReply(reply)) {
        throw new AuthBlocked()
      }
      return reply
    } catch (error) {
      throw toThermostatError(error)
    } finally {
      this.lastRequestAt = Date.now()
      this.inFlight.delete(controller)
    }
  }
}
