import axios from 'axios'

const ERROR_RESPONSE_MAX_LENGTH = 200 // Max length of a device reply echoed into logs

export type ThermostatErrorCode =
  | 'TRANSPORT_FAILURE'
  | 'AUTH_BLOCKED'
  | 'DETECTION_FAILED'
  | 'DECODE_ERROR'
  | 'VALIDATION_ERROR'
  | 'UNWRITABLE_PARAMETER'
  | 'TIMEOUT'
  | 'NOT_READY'
  | 'GENERATION_MISMATCH'
  | 'CLIENT_STOPPED'

/**
 * Base class for every failure the thermostat client reports.
 * `retryable` tells the poll coordinator whether backing off and trying again can help.
 */
export abstract class ThermostatError extends Error {
  abstract readonly code: ThermostatErrorCode
  abstract readonly retryable: boolean

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Network-level failure: connection refused, reset, unreachable host, non-JSON reply */
export class TransportFailure extends ThermostatError {
  readonly code = 'TRANSPORT_FAILURE'
  readonly retryable = true
}

/** Local API access is disabled on the device; only the owner can lift it */
export class AuthBlocked extends ThermostatError {
  readonly code = 'AUTH_BLOCKED'
  readonly retryable = false

  constructor(message = 'Local control is disabled on the device (LAN block active)', options?: { cause?: unknown }) {
    super(message, options)
  }
}

export class DetectionFailed extends ThermostatError {
  readonly code = 'DETECTION_FAILED'
  readonly retryable = true
}

export class DecodeError extends ThermostatError {
  readonly code = 'DECODE_ERROR'
  readonly retryable = true
}

/** Command rejected before reaching the network */
export class ValidationError extends ThermostatError {
  readonly code: 'VALIDATION_ERROR' | 'UNWRITABLE_PARAMETER' = 'VALIDATION_ERROR'
  readonly retryable = false

  constructor(
    message: string,
    readonly parameter?: string,
  ) {
    super(message)
  }
}

export class UnwritableParameter extends ValidationError {
  readonly code = 'UNWRITABLE_PARAMETER'

  constructor(parameter: string) {
    super(`Parameter "${parameter}" is read-only`, parameter)
  }
}

/**
 * No reply within the request deadline. For writes the device state is unknown
 * until the next poll reconciles it.
 */
export class TimeoutError extends ThermostatError {
  readonly code = 'TIMEOUT'
  readonly retryable = true
}

export class NotReady extends ThermostatError {
  readonly code = 'NOT_READY'
  readonly retryable = true

  constructor(message = 'Device generation has not been detected yet') {
    super(message)
  }
}

/** A poll contradicts the generation detected for this session */
export class GenerationMismatch extends ThermostatError {
  readonly code = 'GENERATION_MISMATCH'
  readonly retryable = false
}

export class ClientStopped extends ThermostatError {
  readonly code = 'CLIENT_STOPPED'
  readonly retryable = false

  constructor(message = 'Thermostat client has been stopped') {
    super(message)
  }
}

export const isThermostatError = (error: unknown): error is ThermostatError => error instanceof ThermostatError

export function formatAxiosError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status
    const statusText = error.response?.statusText
    const method = error.config?.method?.toUpperCase()
    const url = error.config?.url

    let formatted = error.message
    if (status) {
      const statusPart = statusText ? ` ${statusText}` : ''
      formatted += ` (${status}${statusPart})`
    }
    if (method && url) {
      formatted += ` [${method} ${url}]`
    }

    if (error.response?.data && typeof error.response.data === 'object') {
      const responseStr = JSON.stringify(error.response.data)
      if (responseStr.length < ERROR_RESPONSE_MAX_LENGTH) {
        formatted += ` - ${responseStr}`
      }
    }

    return formatted
  }
  return String(error)
}

/**
 * One-line rendering of any error for log output, unwrapping the cause chain
 */
export function formatError(error: unknown): string {
  if (isThermostatError(error)) {
    const base = `${error.code}: ${error.message}`
    return error.cause === undefined ? base : `${base} (caused by ${formatError(error.cause)})`
  }
  if (axios.isAxiosError(error)) {
    return formatAxiosError(error)
  }
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

/**
 * Map anything thrown while talking to the device onto the error taxonomy
 */
export function toThermostatError(error: unknown): ThermostatError {
  if (isThermostatError(error)) {
    return error
  }
  if (axios.isCancel(error) || (error instanceof Error && error.name === 'AbortError')) {
    return new ClientStopped('Request aborted')
  }
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new TimeoutError(`No reply within the request deadline: ${error.message}`, { cause: error })
    }
    const status = error.response?.status
    if (status === 401 || status === 403) {
      return new AuthBlocked(undefined, { cause: error })
    }
    return new TransportFailure(formatAxiosError(error), { cause: error })
  }
  return new TransportFailure(error instanceof Error ? error.message : String(error), { cause: error })
}
