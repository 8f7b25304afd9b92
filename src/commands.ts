import { UnwritableParameter, ValidationError } from './errors.js'
import { readBoolean, readEnum, readNumber, setpointParameter } from './state.js'
import {
  type CommandValue,
  type CommandValues,
  encodeIntent,
  encodeValue,
  powerFromRaw,
  type RawTelegram,
  scaleRaw,
  unscaleValue,
} from './telegram/codec.js'
import {
  generationsFor,
  isParameterName,
  type ParameterDescriptor,
  type ParameterName,
  type ParameterSchema,
} from './telegram/schema.js'
import type { ControlSource, DeviceState } from './types/state.js'

export type Preset = 'schedule' | 'manual'
export type HvacMode = 'off' | 'heat' | 'cool' | 'auto'

export interface CommandIntent {
  values: CommandValues
}

/**
 * Entity-level commands that may touch several parameters at once
 */
export type ThermostatAction =
  | { action: 'setTargetTemperature'; temperature: number }
  | { action: 'setPreset'; preset: Preset }
  | { action: 'setHvacMode'; mode: HvacMode }
  | { action: 'setPower'; on: boolean }
  | { action: 'setControlType'; controlType: ControlSource }
  | { action: 'setFloorLimits'; lower: number; upper: number }
  | { action: 'setAirLimits'; lower: number; upper: number }

export type ThermostatCommand = CommandIntent | ThermostatAction

// Parameter pairs that must satisfy lower <= upper after a write
const ORDERED_PAIRS: ReadonlyArray<readonly [ParameterName, ParameterName]> = [
  ['lowerFloorLimit', 'upperFloorLimit'],
  ['lowerAirLimit', 'upperAirLimit'],
  ['airModeFloorMin', 'airModeFloorMax'],
  ['lowerWarningTemperature', 'upperWarningTemperature'],
]

const GRID_TOLERANCE = 1e-9

export const isThermostatAction = (intent: ThermostatCommand): intent is ThermostatAction =>
  'action' in intent

function checkBounds(descriptor: { name: ParameterName; min?: number; max?: number }, value: number): void {
  if (
    (descriptor.min !== undefined && value < descriptor.min) ||
    (descriptor.max !== undefined && value > descriptor.max)
  ) {
    throw new ValidationError(
      `${descriptor.name} must be between ${descriptor.min ?? '-∞'} and ${descriptor.max ?? '∞'}, got ${value}`,
      descriptor.name,
    )
  }
}

/**
 * Check a single value against its descriptor: type, declared range, and the
 * device's value grid.
 */
export function validateValue(descriptor: ParameterDescriptor, value: CommandValue): void {
  // Type and option-set checks
  const raw = encodeValue(descriptor, value)
  if (typeof value !== 'number') {
    return
  }

  switch (descriptor.kind) {
    case 'temperature':
      checkBounds(descriptor, value)
      if (Math.abs(scaleRaw(raw, descriptor.scale) - value) > GRID_TOLERANCE) {
        throw new ValidationError(
          `${descriptor.name} must be a multiple of ${descriptor.scale}, got ${value}`,
          descriptor.name,
        )
      }
      return
    case 'power':
      checkBounds(descriptor, value)
      if (powerFromRaw(raw) !== value) {
        throw new ValidationError(
          `${descriptor.name} must be a multiple of 10 W up to 1500 W and of 20 W above, got ${value}`,
          descriptor.name,
        )
      }
      return
    case 'integer':
      checkBounds(descriptor, value)
      return
    default:
      return
  }
}

function resolveDescriptor(name: string, schema: ParameterSchema): ParameterDescriptor {
  if (!isParameterName(name)) {
    throw new ValidationError(`Unknown parameter "${name}"`, name)
  }
  const descriptor = schema.get(name)
  if (!descriptor) {
    const supported = generationsFor(name)
    const where = schema.generation ? `${schema.generation}-generation` : 'this'
    throw new ValidationError(
      supported.length > 0
        ? `Parameter "${name}" is not available on ${where} thermostats`
        : `Parameter "${name}" is not part of the active schema`,
      name,
    )
  }
  if (!descriptor.writable) {
    throw new UnwritableParameter(name)
  }
  return descriptor
}

/**
 * Validate an intent against the active schema and current snapshot, then
 * encode it into a partial telegram carrying only the intent's fields.
 * Runs before any network traffic; every failure is a ValidationError.
 */
export function buildCommand(intent: CommandIntent, schema: ParameterSchema, state: DeviceState): RawTelegram {
  const entries = Object.entries(intent.values).filter(
    (entry): entry is [string, CommandValue] => entry[1] !== undefined,
  )
  if (entries.length === 0) {
    throw new ValidationError('Command does not set any parameter')
  }

  for (const [name, value] of entries) {
    validateValue(resolveDescriptor(name, schema), value)
  }

  for (const [lowerName, upperName] of ORDERED_PAIRS) {
    if (intent.values[lowerName] === undefined && intent.values[upperName] === undefined) continue

    const lowerValue = intent.values[lowerName] ?? readNumber(state.parameters, lowerName)
    const upperValue = intent.values[upperName] ?? readNumber(state.parameters, upperName)
    if (typeof lowerValue === 'number' && typeof upperValue === 'number' && lowerValue > upperValue) {
      throw new ValidationError(
        `${lowerName} (${lowerValue}) must not exceed ${upperName} (${upperValue})`,
        intent.values[lowerName] === undefined ? upperName : lowerName,
      )
    }
  }

  return encodeIntent(intent.values, schema)
}

// Snap a temperature onto the descriptor's grid and range
function fitTemperature(descriptor: ParameterDescriptor | undefined, value: number): number {
  if (!descriptor || descriptor.kind !== 'temperature') {
    return value
  }
  const snapped = scaleRaw(unscaleValue(value, descriptor.scale), descriptor.scale)
  return Math.min(descriptor.max ?? snapped, Math.max(descriptor.min ?? snapped, snapped))
}

/**
 * Expand an entity-level action into the set of parameter writes that realises
 * it without leaving the device in a contradictory state. Fields that already
 * hold the wanted value are left out, except the one the action is about.
 */
export function resolveAction(action: ThermostatAction, schema: ParameterSchema, state: DeviceState): CommandIntent {
  const { parameters, derived, telemetry } = state
  const values: CommandValues = {}

  const ensurePoweredOn = () => {
    if (readBoolean(parameters, 'powerOff') !== false) {
      values.powerOff = false
    }
  }

  // Manual mode needs a manual setpoint for the active source; seed one from
  // what the device is currently holding when none is known
  const selectManual = (primary: boolean) => {
    if (primary || readEnum(parameters, 'mode') !== 'manual') {
      values.mode = 'manual'
    }
    const manualName = setpointParameter(derived.controlSource, 'manual')
    if (values[manualName] !== undefined || readNumber(parameters, manualName) !== null) {
      return
    }
    const fallback =
      telemetry.reportedSetpoint ?? readNumber(parameters, setpointParameter(derived.controlSource, 'away'))
    if (fallback === null) {
      throw new ValidationError('No setpoint is known for manual mode; set a target temperature instead', manualName)
    }
    values[manualName] = fitTemperature(schema.get(manualName), fallback)
  }

  switch (action.action) {
    case 'setTargetTemperature': {
      const { min, max } = derived.setpointRange
      if (action.temperature < min || action.temperature > max) {
        throw new ValidationError(`Target temperature must be between ${min} and ${max}, got ${action.temperature}`)
      }
      values[setpointParameter(derived.controlSource, 'manual')] = action.temperature
      ensurePoweredOn()
      selectManual(false)
      break
    }
    case 'setPreset':
      ensurePoweredOn()
      if (action.preset === 'manual') {
        selectManual(true)
      } else {
        values.mode = 'schedule'
      }
      break
    case 'setHvacMode':
      switch (action.mode) {
        case 'off':
          values.powerOff = true
          break
        case 'heat':
        case 'cool':
          values.coolingMode = action.mode === 'cool'
          ensurePoweredOn()
          selectManual(false)
          break
        case 'auto':
          ensurePoweredOn()
          values.mode = 'schedule'
          break
      }
      break
    case 'setPower':
      values.powerOff = !action.on
      break
    case 'setControlType':
      values.controlType = action.controlType
      break
    case 'setFloorLimits':
      values.lowerFloorLimit = action.lower
      values.upperFloorLimit = action.upper
      break
    case 'setAirLimits':
      values.lowerAirLimit = action.lower
      values.upperAirLimit = action.upper
      break
  }

  return { values }
}
