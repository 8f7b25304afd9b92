import { z } from 'zod'
import { DecodeError, UnwritableParameter, ValidationError } from '../errors.js'
import type { DecodedParameters, DecodedValue, Telemetry } from '../types/state.js'
import {
  type DeviceGeneration,
  isParameterName,
  type ParameterDescriptor,
  type ParameterName,
  type ParameterSchema,
  STATUS_FIELDS,
  STATUS_OPERATING_MODES,
  STATUS_TEMPERATURE_DIVISOR,
  WireDataType,
} from './schema.js'

export type RawScalar = number | string | boolean | null

/** Wire index (as a string key) to raw device scalar. Lives for one decode or encode pass. */
export type RawTelegram = Record<string, RawScalar>

/** `[wireIndex, dataType, value]` as carried in the `par` array */
export type WireParam = [number, WireDataType, string]

export type CommandValue = number | boolean | string
export type CommandValues = Partial<Record<ParameterName, CommandValue>>

const POWER_LOW_RANGE_LIMIT = 150 // Raw values up to here count in 10 W steps, above in 20 W steps
const POWER_LOW_RANGE_WATTS = POWER_LOW_RANGE_LIMIT * 10

/**
 * Enum code the schema does not declare. Kept in the snapshot in place of a
 * value so one odd field never fails the whole decode.
 */
export class UnknownEnumValue {
  constructor(readonly raw: number) {}

  toString(): string {
    return `unknown(${this.raw})`
  }

  toJSON(): string {
    return this.toString()
  }
}

export const isUnknownEnumValue = (value: unknown): value is UnknownEnumValue => value instanceof UnknownEnumValue

const NUMERIC_PATTERN = /^-?\d+(\.\d+)?$/

function toNumber(raw: Exclude<RawScalar, null>, field: string): number {
  if (typeof raw === 'number') {
    if (Number.isFinite(raw)) return raw
  } else if (typeof raw === 'boolean') {
    return raw ? 1 : 0
  } else {
    const trimmed = raw.trim()
    if (NUMERIC_PATTERN.test(trimmed)) return Number(trimmed)
  }
  throw new DecodeError(`Field ${field} carries a non-numeric value: ${JSON.stringify(raw)}`)
}

// Scales below one are stored as divisors so 221 * 0.1 comes out as 22.1
const scaleDivisor = (scale: number): number => (scale < 1 ? Math.round(1 / scale) : 1)

export function scaleRaw(raw: number, scale: number): number {
  const divisor = scaleDivisor(scale)
  return divisor > 1 ? raw / divisor : raw * scale
}

export function unscaleValue(value: number, scale: number): number {
  const divisor = scaleDivisor(scale)
  return divisor > 1 ? Math.round(value * divisor) : Math.round(value / scale)
}

export const powerFromRaw = (raw: number): number =>
  raw <= POWER_LOW_RANGE_LIMIT ? raw * 10 : raw * 20 - POWER_LOW_RANGE_WATTS

export const powerToRaw = (watts: number): number =>
  watts <= POWER_LOW_RANGE_WATTS ? Math.floor(watts / 10) : Math.floor((watts + POWER_LOW_RANGE_WATTS) / 20)

export function decodeValue(descriptor: ParameterDescriptor, raw: Exclude<RawScalar, null>): DecodedValue {
  const value = toNumber(raw, `${descriptor.wireIndex} (${descriptor.name})`)
  switch (descriptor.kind) {
    case 'integer':
      return value
    case 'temperature':
      return scaleRaw(value, descriptor.scale)
    case 'power':
      return powerFromRaw(value)
    case 'boolean':
      return value !== 0
    case 'enum':
      return descriptor.options[String(value)] ?? new UnknownEnumValue(value)
  }
}

export function encodeValue(descriptor: ParameterDescriptor, value: CommandValue): number {
  const mismatch = (expected: string) =>
    new ValidationError(
      `Parameter "${descriptor.name}" expects ${expected}, got ${JSON.stringify(value)}`,
      descriptor.name,
    )

  switch (descriptor.kind) {
    case 'boolean':
      if (typeof value !== 'boolean') throw mismatch('a boolean')
      return value ? 1 : 0
    case 'enum': {
      const entry = Object.entries(descriptor.options).find(([, name]) => name === value)
      if (!entry) {
        throw mismatch(`one of ${Object.values(descriptor.options).join(', ')}`)
      }
      return Number(entry[0])
    }
    case 'integer':
      if (typeof value !== 'number' || !Number.isInteger(value)) throw mismatch('an integer')
      return value
    case 'temperature':
      if (typeof value !== 'number' || !Number.isFinite(value)) throw mismatch('a temperature')
      return unscaleValue(value, descriptor.scale)
    case 'power':
      if (typeof value !== 'number' || !Number.isInteger(value)) throw mismatch('a whole number of watts')
      return powerToRaw(value)
  }
}

/**
 * Decode a raw telegram against a schema. Indices the schema does not know are
 * skipped, as are null values.
 */
export function decodeTelegram(raw: RawTelegram, schema: ParameterSchema): DecodedParameters {
  const decoded: DecodedParameters = {}
  for (const [key, value] of Object.entries(raw)) {
    const wireIndex = Number(key)
    if (!Number.isInteger(wireIndex) || value === null) continue

    const descriptor = schema.getByIndex(wireIndex)
    if (!descriptor) continue

    decoded[descriptor.name] = decodeValue(descriptor, value)
  }
  return decoded
}

/**
 * Encode exactly the given values into a partial telegram.
 */
export function encodeIntent(values: CommandValues, schema: ParameterSchema): RawTelegram {
  const raw: RawTelegram = {}
  for (const [name, value] of Object.entries(values)) {
    if (value === undefined) continue
    if (!isParameterName(name)) {
      throw new ValidationError(`Unknown parameter "${name}"`, name)
    }
    const descriptor = schema.get(name)
    if (!descriptor) {
      throw new ValidationError(`Parameter "${name}" does not apply to this device`, name)
    }
    if (!descriptor.writable) {
      throw new UnwritableParameter(name)
    }
    raw[String(descriptor.wireIndex)] = encodeValue(descriptor, value)
  }
  return raw
}

export function toWireParams(raw: RawTelegram, schema: ParameterSchema): WireParam[] {
  const params: WireParam[] = []
  for (const [key, value] of Object.entries(raw)) {
    if (value === null) continue
    const descriptor = schema.getByIndex(Number(key))
    if (!descriptor) {
      throw new ValidationError(`Wire index ${key} is not part of the active schema`)
    }
    const text = typeof value === 'boolean' ? (value ? '1' : '0') : String(value)
    params.push([descriptor.wireIndex, descriptor.dataType, text])
  }
  return params
}

const rawScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

const parameterReplySchema = z.object({
  par: z.array(
    z.tuple([
      z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/).transform(Number)]),
      z.union([z.number(), z.string()]),
      rawScalarSchema,
    ]),
  ),
})

/**
 * Unpack a parameter query reply (`{ sn, par: [[idx, type, value], ...] }`).
 */
export function fromWireParams(reply: unknown): RawTelegram {
  const result = parameterReplySchema.safeParse(reply)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue ? `${issue.path.join('.') || 'reply'}: ${issue.message}` : 'unexpected shape'
    throw new DecodeError(`Malformed parameter reply (${where})`)
  }

  const raw: RawTelegram = {}
  for (const [wireIndex, , value] of result.data.par) {
    raw[String(wireIndex)] = value
  }
  return raw
}

// Only the fields in STATUS_FIELDS are type-checked; everything else is ignored
const statusReplySchema = z.record(z.unknown())

/**
 * Decode the live status reply. Air temperature is kept only for floor+air units.
 */
export function decodeStatus(reply: unknown, generation: DeviceGeneration): Telemetry {
  const result = statusReplySchema.safeParse(reply)
  if (!result.success) {
    throw new DecodeError('Malformed status reply')
  }
  const block = result.data

  const readNumber = (key: string): number | null => {
    const field = rawScalarSchema.safeParse(block[key])
    if (!field.success) {
      if (block[key] === undefined) return null
      throw new DecodeError(`Field ${key} carries a non-numeric value: ${JSON.stringify(block[key])}`)
    }
    const value = field.data
    if (value === null || value === '') return null
    return toNumber(value, key)
  }
  const readTemperature = (key: string): number | null => {
    const value = readNumber(key)
    return value === null ? null : value / STATUS_TEMPERATURE_DIVISOR
  }

  const mode = readNumber(STATUS_FIELDS.operatingMode)
  const relay = readNumber(STATUS_FIELDS.relay)
  const power = readNumber(STATUS_FIELDS.powerFlag)

  const telemetry: Telemetry = {
    floorTemperature: readTemperature(STATUS_FIELDS.floorTemperature),
    reportedSetpoint: readTemperature(STATUS_FIELDS.reportedSetpoint),
    operatingMode: mode === null ? null : (STATUS_OPERATING_MODES[String(mode)] ?? new UnknownEnumValue(mode)),
    relayActive: relay === null ? null : relay === 1,
    powerReportedOn: power === null ? null : power === 0,
  }
  if (generation === 'new') {
    telemetry.airTemperature = readTemperature(STATUS_FIELDS.airTemperature)
  }
  return telemetry
}
