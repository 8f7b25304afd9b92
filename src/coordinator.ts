import { formatError, type ThermostatError, type ThermostatErrorCode, toThermostatError } from './errors.js'
import createLogger from './logger.js'

const logger = createLogger('coordinator')

// Configuration constants
const DEFAULT_RETRY_BASE_MS = 5_000 // First retry delay after a failed cycle
const DEFAULT_MAX_BACKOFF_MS = 300_000 // Retry delays double up to this bound
const STALE_AFTER_INTERVALS = 3 // Default staleness threshold, in poll intervals

export type CoordinatorPhase = 'uninitialized' | 'detecting' | 'polling' | 'degraded' | 'stopped'

export type DegradedReason =
  | 'not_ready'
  | 'detection_failed'
  | 'auth_blocked'
  | 'transport_failure'
  | 'timeout'
  | 'decode_error'
  | 'generation_mismatch'
  | 'stopped'

export type HealthStatus =
  | { status: 'fresh'; ageMs: number }
  | { status: 'stale'; staleForMs: number }
  | { status: 'degraded'; reason: DegradedReason; message?: string; ageMs: number | null }

const REASON_BY_CODE: Record<ThermostatErrorCode, DegradedReason> = {
  TRANSPORT_FAILURE: 'transport_failure',
  AUTH_BLOCKED: 'auth_blocked',
  DETECTION_FAILED: 'detection_failed',
  DECODE_ERROR: 'decode_error',
  VALIDATION_ERROR: 'transport_failure',
  UNWRITABLE_PARAMETER: 'transport_failure',
  TIMEOUT: 'timeout',
  NOT_READY: 'not_ready',
  GENERATION_MISMATCH: 'generation_mismatch',
  CLIENT_STOPPED: 'stopped',
}

/**
 * The device-facing work the coordinator schedules. Both tasks run inside the
 * client's serial queue; `poll` swaps the snapshot before resolving.
 */
export interface CoordinatorTasks {
  detect(): Promise<void>
  poll(): Promise<void>
  /** Epoch milliseconds of the last confirmed poll */
  lastUpdatedAt(): number | null
}

export interface PollCoordinatorOptions {
  pollIntervalMs: number
  retryBaseMs?: number
  maxBackoffMs?: number
  staleAfterMs?: number
  onPhaseChange?: (phase: CoordinatorPhase, previous: CoordinatorPhase) => void
}

/**
 * Drives detection and periodic polling:
 * uninitialized -> detecting -> polling <-> degraded, with stopped as the end.
 * Failed cycles retry with exponential backoff; failures that retrying cannot
 * fix (local control blocked, generation mismatch) park the coordinator until
 * refreshNow() or reset() is called.
 */
export class PollCoordinator {
  private currentPhase: CoordinatorPhase = 'uninitialized'
  private timer?: NodeJS.Timeout
  private cycle?: Promise<void>
  private consecutiveFailures = 0
  private lastFailure: ThermostatError | null = null
  private parked = false

  private readonly pollIntervalMs: number
  private readonly retryBaseMs: number
  private readonly maxBackoffMs: number
  private readonly staleAfterMs: number

  constructor(
    private readonly tasks: CoordinatorTasks,
    private readonly options: PollCoordinatorOptions,
  ) {
    this.pollIntervalMs = options.pollIntervalMs
    this.retryBaseMs = options.retryBaseMs ?? DEFAULT_RETRY_BASE_MS
    this.maxBackoffMs = Math.max(options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS, this.retryBaseMs)
    this.staleAfterMs = options.staleAfterMs ?? options.pollIntervalMs * STALE_AFTER_INTERVALS
  }

  public get phase(): CoordinatorPhase {
    return this.currentPhase
  }

  public get failures(): number {
    return this.consecutiveFailures
  }

  public get lastError(): ThermostatError | null {
    return this.lastFailure
  }

  public get isParked(): boolean {
    return this.parked
  }

  public start(): void {
    if (this.currentPhase !== 'uninitialized') {
      return
    }
    this.setPhase('detecting')
    this.schedule(0)
  }

  /**
   * Forget the detected generation and detect again on the next cycle
   */
  public reset(): void {
    if (this.currentPhase === 'stopped') {
      return
    }
    this.clearTimer()
    this.consecutiveFailures = 0
    this.lastFailure = null
    this.parked = false
    this.setPhase('detecting')
    this.schedule(0)
  }

  public stop(): void {
    this.clearTimer()
    this.setPhase('stopped')
  }

  /**
   * Run a cycle now, also when parked. Resolves once the cycle has finished.
   */
  public async refreshNow(): Promise<void> {
    if (this.currentPhase === 'stopped' || this.currentPhase === 'uninitialized') {
      return
    }
    if (this.cycle) {
      return this.cycle
    }
    this.clearTimer()
    this.parked = false
    return this.runCycle()
  }

  /**
   * Pull the next poll forward, e.g. to reconcile after a write
   */
  public requestRefresh(delayMs: number): void {
    if (this.parked || (this.currentPhase !== 'polling' && this.currentPhase !== 'degraded')) {
      return
    }
    if (this.cycle) {
      return
    }
    this.schedule(delayMs)
  }

  public healthStatus(now: number = Date.now()): HealthStatus {
    const updatedAt = this.tasks.lastUpdatedAt()
    const ageMs = updatedAt === null ? null : Math.max(0, now - updatedAt)

    switch (this.currentPhase) {
      case 'stopped':
        return { status: 'degraded', reason: 'stopped', ageMs }
      case 'uninitialized':
        return { status: 'degraded', reason: 'not_ready', ageMs }
      case 'detecting':
      case 'degraded':
        return this.lastFailure
          ? {
              status: 'degraded',
              reason: REASON_BY_CODE[this.lastFailure.code],
              message: this.lastFailure.message,
              ageMs,
            }
          : { status: 'degraded', reason: 'not_ready', ageMs }
      case 'polling':
        if (ageMs === null) {
          return { status: 'degraded', reason: 'not_ready', ageMs }
        }
        return ageMs > this.staleAfterMs ? { status: 'stale', staleForMs: ageMs } : { status: 'fresh', ageMs }
    }
  }

  /** Delay before the next attempt after `failures` consecutive failed cycles */
  public backoffDelay(failures: number = this.consecutiveFailures): number {
    return Math.min(this.retryBaseMs * 2 ** Math.max(0, failures - 1), this.maxBackoffMs)
  }

  private setPhase(phase: CoordinatorPhase) {
    const previous = this.currentPhase
    if (previous === phase) return
    this.currentPhase = phase
    logger.debug(`Phase ${previous} -> ${phase}`)
    this.options.onPhaseChange?.(phase, previous)
  }

  private schedule(delayMs: number) {
    this.clearTimer()
    this.timer = setTimeout(() => {
      this.timer = undefined
      void this.runCycle()
    }, delayMs)
  }

  private clearTimer() {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = undefined
    }
  }

  private runCycle(): Promise<void> {
    if (!this.cycle) {
      this.cycle = this.executeCycle().finally(() => {
        this.cycle = undefined
      })
    }
    return this.cycle
  }

  private async executeCycle(): Promise<void> {
    if (this.currentPhase === 'stopped') {
      return
    }

    try {
      if (this.currentPhase === 'detecting') {
        await this.tasks.detect()
        this.setPhase('polling')
      }
      await this.tasks.poll()
    } catch (error) {
      this.handleFailure(toThermostatError(error))
      return
    }

    if (this.phase === 'stopped') {
      return
    }
    if (this.consecutiveFailures > 0) {
      logger.info(`Device reachable again after ${this.consecutiveFailures} failed attempt(s)`)
    }
    this.consecutiveFailures = 0
    this.lastFailure = null
    this.setPhase('polling')
    this.schedule(this.pollIntervalMs)
  }

  private handleFailure(failure: ThermostatError) {
    if (this.currentPhase === 'stopped') {
      return
    }

    this.consecutiveFailures++
    this.lastFailure = failure
    if (this.currentPhase !== 'detecting') {
      this.setPhase('degraded')
    }

    if (!failure.retryable) {
      this.parked = true
      logger.error(`Automatic polling paused: ${formatError(failure)}`)
      return
    }

    const delay = this.backoffDelay()
    logger.warn(`Cycle failed (${this.consecutiveFailures} in a row), retrying in ${delay / 1000}s: ${formatError(failure)}`)
    this.schedule(delay)
  }
}
