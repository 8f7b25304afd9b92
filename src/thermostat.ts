import { buildCommand, isThermostatAction, resolveAction, type ThermostatCommand } from './commands.js'
import { type CoordinatorPhase, type HealthStatus, PollCoordinator } from './coordinator.js'
import { assertGeneration, detectGeneration } from './detector.js'
import {
  formatError,
  GenerationMismatch,
  NotReady,
  type ThermostatError,
  TimeoutError,
  toThermostatError,
  ValidationError,
} from './errors.js'
import createLogger from './logger.js'
import { SerialQueue } from './queue.js'
import { StateModel } from './state.js'
import { decodeStatus, decodeTelegram, type RawTelegram, toWireParams, type WireParam } from './telegram/codec.js'
import { type DeviceGeneration, schemaFor } from './telegram/schema.js'
import { HttpTransport, type Transport } from './transport.js'
import type { DeviceState } from './types/state.js'

const logger = createLogger('thermostat')

// Configuration constants
const DEFAULT_POLL_INTERVAL_MS = 30_000
const MIN_POLL_INTERVAL_MS = 10_000
const MAX_POLL_INTERVAL_MS = 300_000
const DEFAULT_RECONCILE_DELAY_MS = 2_000 // Poll this long after a write to confirm it

export interface ThermostatClientOptions {
  host: string
  serialNumber: string
  /** Skip detection when the hardware generation is known */
  generation?: DeviceGeneration | 'auto'
  pollIntervalMs?: number
  requestTimeoutMs?: number
  minRequestGapMs?: number
  retryBaseMs?: number
  maxBackoffMs?: number
  staleAfterMs?: number
  reconcileDelayMs?: number
  transport?: Transport
}

export type CommandResult = { ok: true; state: DeviceState } | { ok: false; error: ThermostatError }

export type StateListener = (state: DeviceState, previous: DeviceState) => void
export type PhaseListener = (phase: CoordinatorPhase, previous: CoordinatorPhase) => void

/**
 * Local-network client for one thermostat: detects the hardware generation,
 * keeps an immutable snapshot fresh by polling, and turns commands into
 * minimal parameter writes.
 */
export class ThermostatClient {
  private readonly transport: Transport
  private readonly queue = new SerialQueue()
  private readonly model = new StateModel()
  private readonly coordinator: PollCoordinator
  private readonly pinnedGeneration: DeviceGeneration | null
  private readonly reconcileDelayMs: number
  private readonly stateListeners = new Set<StateListener>()
  private readonly phaseListeners = new Set<PhaseListener>()
  private generation: DeviceGeneration | null = null

  constructor(options: ThermostatClientOptions) {
    const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    if (pollIntervalMs < MIN_POLL_INTERVAL_MS || pollIntervalMs > MAX_POLL_INTERVAL_MS) {
      throw new ValidationError(
        `Poll interval must be between ${MIN_POLL_INTERVAL_MS / 1000} and ${MAX_POLL_INTERVAL_MS / 1000} seconds`,
      )
    }

    this.pinnedGeneration = options.generation && options.generation !== 'auto' ? options.generation : null
    this.reconcileDelayMs = options.reconcileDelayMs ?? DEFAULT_RECONCILE_DELAY_MS
    this.transport =
      options.transport ??
      new HttpTransport({
        host: options.host,
        serialNumber: options.serialNumber,
        timeoutMs: options.requestTimeoutMs,
        minRequestGapMs: options.minRequestGapMs,
      })
    this.coordinator = new PollCoordinator(
      {
        detect: () => this.detect(),
        poll: () => this.poll(),
        lastUpdatedAt: () => this.model.currentSnapshot().updatedAt,
      },
      {
        pollIntervalMs,
        retryBaseMs: options.retryBaseMs,
        maxBackoffMs: options.maxBackoffMs,
        staleAfterMs: options.staleAfterMs,
        onPhaseChange: (phase, previous) => this.notifyPhase(phase, previous),
      },
    )
  }

  public start(): void {
    this.queue.reopen()
    this.coordinator.start()
  }

  /**
   * Stop polling, abort in-flight requests and reject queued ones
   */
  public async stop(): Promise<void> {
    this.coordinator.stop()
    this.queue.close()
    this.transport.abortAll()
    logger.info('Thermostat client stopped')
  }

  /**
   * Drop the detected generation and snapshot, then detect again
   */
  public async reset(): Promise<void> {
    if (this.coordinator.phase === 'stopped') {
      return
    }
    await this.queue.enqueue(async () => {
      this.generation = null
      this.swap(() => this.model.reset())
    })
    this.coordinator.reset()
  }

  public getState(): DeviceState {
    return this.model.currentSnapshot()
  }

  public getGeneration(): DeviceGeneration | 'uninitialized' {
    return this.generation ?? 'uninitialized'
  }

  public get phase(): CoordinatorPhase {
    return this.coordinator.phase
  }

  public healthStatus(now?: number): HealthStatus {
    return this.coordinator.healthStatus(now)
  }

  /**
   * Poll now, regardless of the schedule, and return the resulting snapshot
   */
  public async refresh(): Promise<DeviceState> {
    await this.coordinator.refreshNow()
    return this.model.currentSnapshot()
  }

  public onUpdate(listener: StateListener): () => void {
    this.stateListeners.add(listener)
    return () => this.stateListeners.delete(listener)
  }

  public onPhaseChange(listener: PhaseListener): () => void {
    this.phaseListeners.add(listener)
    return () => this.phaseListeners.delete(listener)
  }

  /**
   * Validate, encode and write a command. Validation failures return before
   * any network traffic. Writes are never retried; on success the snapshot
   * carries the written values (unconfirmed) until the next poll.
   */
  public async issueCommand(request: ThermostatCommand): Promise<CommandResult> {
    const generation = this.generation
    if (!generation) {
      return { ok: false, error: new NotReady() }
    }

    const schema = schemaFor(generation)
    let raw: RawTelegram
    let params: WireParam[]
    try {
      const state = this.model.currentSnapshot()
      const intent = isThermostatAction(request) ? resolveAction(request, schema, state) : request
      raw = buildCommand(intent, schema, state)
      params = toWireParams(raw, schema)
    } catch (error) {
      const failure = toThermostatError(error)
      logger.warn(`Command rejected: ${formatError(failure)}`)
      return { ok: false, error: failure }
    }

    try {
      const state = await this.queue.enqueue(async () => {
        if (this.generation !== generation) {
          throw new GenerationMismatch('Device generation changed while the command was queued')
        }
        await this.transport.writeParameters(params)
        return this.swap(() => this.model.applyOptimistic(decodeTelegram(raw, schema)))
      })
      logger.info('Command acknowledged:', raw)
      this.coordinator.requestRefresh(this.reconcileDelayMs)
      return { ok: true, state }
    } catch (error) {
      const failure = toThermostatError(error)
      if (failure instanceof TimeoutError) {
        logger.warn('Write timed out; the next poll will show whether it was applied')
        this.coordinator.requestRefresh(this.reconcileDelayMs)
      } else {
        logger.error(`Command failed: ${formatError(failure)}`)
      }
      return { ok: false, error: failure }
    }
  }

  public setFloorLimits(lower: number, upper: number): Promise<CommandResult> {
    return this.issueCommand({ action: 'setFloorLimits', lower, upper })
  }

  /** Floor+air units only */
  public setAirLimits(lower: number, upper: number): Promise<CommandResult> {
    return this.issueCommand({ action: 'setAirLimits', lower, upper })
  }

  public async restart(): Promise<CommandResult> {
    if (!this.generation) {
      return { ok: false, error: new NotReady() }
    }
    try {
      await this.queue.enqueue(() => this.transport.restart())
      return { ok: true, state: this.model.currentSnapshot() }
    } catch (error) {
      const failure = toThermostatError(error)
      logger.error(`Restart failed: ${formatError(failure)}`)
      return { ok: false, error: failure }
    }
  }

  private async detect(): Promise<void> {
    await this.queue.enqueue(async () => {
      if (this.pinnedGeneration) {
        logger.info(`Using configured generation "${this.pinnedGeneration}", skipping detection`)
        this.generation = this.pinnedGeneration
        return
      }
      this.generation = await detectGeneration(this.transport)
    })
  }

  private async poll(): Promise<void> {
    await this.queue.enqueue(async () => {
      const generation = this.generation
      if (!generation) {
        throw new NotReady()
      }
      const raw = await this.transport.readParameters()
      const status = await this.transport.readStatus()
      assertGeneration(raw, generation)

      const parameters = decodeTelegram(raw, schemaFor(generation))
      const telemetry = decodeStatus(status, generation)
      this.swap(() => this.model.applyDecoded(generation, parameters, telemetry))
    })
  }

  private swap(update: () => DeviceState): DeviceState {
    const previous = this.model.currentSnapshot()
    const next = update()
    for (const listener of this.stateListeners) {
      try {
        listener(next, previous)
      } catch (error) {
        logger.error('State listener failed:', error)
      }
    }
    return next
  }

  private notifyPhase(phase: CoordinatorPhase, previous: CoordinatorPhase) {
    for (const listener of this.phaseListeners) {
      try {
        listener(phase, previous)
      } catch (error) {
        logger.error('Phase listener failed:', error)
      }
    }
  }
}
