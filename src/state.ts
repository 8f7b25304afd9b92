import { GenerationMismatch, NotReady } from './errors.js'
import { type DeviceGeneration, type ParameterName, schemaFor } from './telegram/schema.js'
import type {
  ControlSource,
  DecodedParameters,
  DerivedState,
  DeviceState,
  SnapshotParameters,
  Telemetry,
  TemperatureRange,
} from './types/state.js'

const FLOOR_DEFAULT_RANGE: TemperatureRange = { min: 5, max: 45 }
const AIR_DEFAULT_RANGE: TemperatureRange = { min: 5, max: 35 }
const CONTROL_SOURCES: readonly ControlSource[] = ['floor', 'air', 'airWithFloorLimit']

const EMPTY_TELEMETRY: Telemetry = {
  floorTemperature: null,
  reportedSetpoint: null,
  operatingMode: null,
  relayActive: null,
  powerReportedOn: null,
}

export const readNumber = (parameters: SnapshotParameters, name: ParameterName): number | null => {
  const value = parameters[name]
  return typeof value === 'number' ? value : null
}

export const readBoolean = (parameters: SnapshotParameters, name: ParameterName): boolean | null => {
  const value = parameters[name]
  return typeof value === 'boolean' ? value : null
}

export const readEnum = (parameters: SnapshotParameters, name: ParameterName): string | null => {
  const value = parameters[name]
  return typeof value === 'string' ? value : null
}

export function controlSourceOf(generation: DeviceGeneration | null, parameters: SnapshotParameters): ControlSource {
  if (generation !== 'new') {
    return 'floor'
  }
  const controlType = readEnum(parameters, 'controlType')
  return CONTROL_SOURCES.find((source) => source === controlType) ?? 'floor'
}

/** Setpoint parameter governing the active control source for the given mode */
export function setpointParameter(source: ControlSource, kind: 'manual' | 'away'): ParameterName {
  const airBased = source !== 'floor'
  if (kind === 'manual') {
    return airBased ? 'manualAirTemperature' : 'manualFloorTemperature'
  }
  return airBased ? 'awayAirTemperature' : 'awayFloorTemperature'
}

/**
 * Fields computed from several raw parameters. Pure in its inputs.
 */
export function deriveState(
  generation: DeviceGeneration | null,
  parameters: SnapshotParameters,
  telemetry: Telemetry,
): DerivedState {
  const powerOff = readBoolean(parameters, 'powerOff')
  const powerOn = powerOff !== null ? !powerOff : telemetry.powerReportedOn
  const controlSource = controlSourceOf(generation, parameters)
  const airBased = controlSource !== 'floor'
  const mode = readEnum(parameters, 'mode')

  const targetTemperature =
    powerOn === false
      ? null
      : readNumber(parameters, setpointParameter(controlSource, mode === 'manual' ? 'manual' : 'away'))

  const setpointRange = airBased
    ? {
        min: readNumber(parameters, 'lowerAirLimit') ?? AIR_DEFAULT_RANGE.min,
        max: readNumber(parameters, 'upperAirLimit') ?? AIR_DEFAULT_RANGE.max,
      }
    : {
        min: readNumber(parameters, 'lowerFloorLimit') ?? FLOOR_DEFAULT_RANGE.min,
        max: readNumber(parameters, 'upperFloorLimit') ?? FLOOR_DEFAULT_RANGE.max,
      }

  return {
    powerOn,
    controlSource,
    targetTemperature,
    currentTemperature: airBased ? (telemetry.airTemperature ?? null) : telemetry.floorTemperature,
    setpointRange,
  }
}

function freezeSnapshot(state: DeviceState): DeviceState {
  Object.freeze(state.parameters)
  Object.freeze(state.telemetry)
  Object.freeze(state.derived.setpointRange)
  Object.freeze(state.derived)
  return Object.freeze(state)
}

function buildSnapshot(
  generation: DeviceGeneration | null,
  revision: number,
  updatedAt: number | null,
  confirmed: boolean,
  parameters: SnapshotParameters,
  telemetry: Telemetry,
): DeviceState {
  return freezeSnapshot({
    generation,
    revision,
    updatedAt,
    confirmed,
    parameters,
    telemetry,
    derived: deriveState(generation, parameters, telemetry),
  })
}

export const emptySnapshot = (revision = 0): DeviceState =>
  buildSnapshot(null, revision, null, false, {}, { ...EMPTY_TELEMETRY })

/**
 * Holds the latest immutable DeviceState and swaps it as a whole.
 */
export class StateModel {
  private snapshot: DeviceState = emptySnapshot()

  public currentSnapshot(): DeviceState {
    return this.snapshot
  }

  /**
   * Replace the snapshot with a freshly polled one. Every parameter of the
   * generation's schema gets a key; parameters the device left out are null.
   */
  public applyDecoded(
    generation: DeviceGeneration,
    fragment: DecodedParameters,
    telemetry: Telemetry,
    at: number = Date.now(),
  ): DeviceState {
    const current = this.snapshot
    if (current.generation !== null && current.generation !== generation) {
      throw new GenerationMismatch(
        `Cannot apply a "${generation}" telegram to a "${current.generation}" snapshot without a reset`,
      )
    }

    const parameters: SnapshotParameters = {}
    for (const name of schemaFor(generation).names()) {
      parameters[name] = fragment[name] ?? null
    }

    const { airTemperature, ...common } = telemetry
    const scopedTelemetry: Telemetry = generation === 'new' ? { ...common, airTemperature: airTemperature ?? null } : common

    this.snapshot = buildSnapshot(generation, current.revision + 1, at, true, parameters, scopedTelemetry)
    return this.snapshot
  }

  /**
   * Publish values a write just set, ahead of the poll that confirms them.
   * Parameters outside the active schema are ignored.
   */
  public applyOptimistic(values: DecodedParameters): DeviceState {
    const current = this.snapshot
    if (current.generation === null) {
      throw new NotReady()
    }

    const schema = schemaFor(current.generation)
    const parameters: SnapshotParameters = { ...current.parameters }
    for (const name of schema.names()) {
      const value = values[name]
      if (value !== undefined) {
        parameters[name] = value
      }
    }

    this.snapshot = buildSnapshot(
      current.generation,
      current.revision + 1,
      current.updatedAt,
      false,
      parameters,
      current.telemetry,
    )
    return this.snapshot
  }

  /** Drop the generation and every value; the revision keeps counting */
  public reset(): DeviceState {
    this.snapshot = emptySnapshot(this.snapshot.revision + 1)
    return this.snapshot
  }
}

/**
 * Milliseconds since the last confirmed poll, or null before the first one
 */
export function snapshotAge(state: DeviceState, now: number = Date.now()): number | null {
  return state.updatedAt === null ? null : Math.max(0, now - state.updatedAt)
}
