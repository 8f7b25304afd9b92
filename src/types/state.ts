import type { UnknownEnumValue } from '../telegram/codec.js'
import type { DeviceGeneration, ParameterName } from '../telegram/schema.js'

export type DecodedValue = number | boolean | string | UnknownEnumValue

/** Typed values keyed by parameter name, as produced by the codec for one telegram */
export type DecodedParameters = Partial<Record<ParameterName, DecodedValue>>

/** A full snapshot's parameters: every key of the generation's schema, null when the device did not report it */
export type SnapshotParameters = Partial<Record<ParameterName, DecodedValue | null>>

export type OperatingMode = 'schedule' | 'manual' | 'away'
export type ControlSource = 'floor' | 'air' | 'airWithFloorLimit'

export interface Telemetry {
  floorTemperature: number | null
  /** Only present on floor+air units */
  airTemperature?: number | null
  reportedSetpoint: number | null
  operatingMode: OperatingMode | UnknownEnumValue | null
  relayActive: boolean | null
  powerReportedOn: boolean | null
}

export interface TemperatureRange {
  min: number
  max: number
}

export interface DerivedState {
  powerOn: boolean | null
  controlSource: ControlSource
  targetTemperature: number | null
  currentTemperature: number | null
  setpointRange: TemperatureRange
}

export interface DeviceState {
  readonly generation: DeviceGeneration | null
  /** Increases by one on every snapshot swap */
  readonly revision: number
  /** Epoch milliseconds of the last confirmed poll */
  readonly updatedAt: number | null
  /** False while the snapshot carries optimistic values from a write not yet seen in a poll */
  readonly confirmed: boolean
  readonly parameters: Readonly<SnapshotParameters>
  readonly telemetry: Readonly<Telemetry>
  readonly derived: Readonly<DerivedState>
}
