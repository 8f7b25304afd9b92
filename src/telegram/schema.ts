import { z } from 'zod'
import parameterTable from './parameters.json' with { type: 'json' }

export type DeviceGeneration = 'old' | 'new'
export const DEVICE_GENERATIONS: readonly DeviceGeneration[] = ['old', 'new']

/** Wire type codes sent as the second element of every `par` triple */
export const WireDataType = {
  CString: 0,
  Int8: 1,
  UInt8: 2,
  Int16: 3,
  UInt16: 4,
  Int32: 5,
  UInt32: 6,
  Bool: 7,
} as const

export type WireDataType = (typeof WireDataType)[keyof typeof WireDataType]

export const PARAMETER_NAMES = [
  'awayStartTime',
  'awayEndTime',
  'mode',
  'controlType',
  'manualAirTemperature',
  'manualFloorTemperature',
  'awayAirTemperature',
  'awayFloorTemperature',
  'airModeFloorMin',
  'airModeFloorMax',
  'loadPower',
  'sensorType',
  'hysteresis',
  'airCorrection',
  'floorCorrection',
  'brightness',
  'proportionalCoefficient',
  'upperFloorLimit',
  'lowerFloorLimit',
  'maxSchedulePeriod',
  'temporaryTemperature',
  'setTemperature',
  'upperAirLimit',
  'lowerAirLimit',
  'wirelessSensorInterval',
  'wirelessSensorBound',
  'nightBrightnessStart',
  'nightBrightnessEnd',
  'relayOnTimeLimit',
  'upperWarningTemperature',
  'lowerWarningTemperature',
  'buttonMinusCorrection',
  'buttonMenuCorrection',
  'buttonPlusCorrection',
  'offButtonLock',
  'lanBlock',
  'cloudBlock',
  'relayInverted',
  'coolingMode',
  'nightBrightness',
  'preHeating',
  'windowOpenDetection',
  'childLock',
  'powerOff',
] as const

export type ParameterName = (typeof PARAMETER_NAMES)[number]

const descriptorBase = {
  wireIndex: z.number().int().nonnegative(),
  name: z.enum(PARAMETER_NAMES),
  dataType: z.union([
    z.literal(WireDataType.CString),
    z.literal(WireDataType.Int8),
    z.literal(WireDataType.UInt8),
    z.literal(WireDataType.Int16),
    z.literal(WireDataType.UInt16),
    z.literal(WireDataType.Int32),
    z.literal(WireDataType.UInt32),
    z.literal(WireDataType.Bool),
  ]),
  writable: z.boolean(),
  appliesTo: z.enum(['old', 'new', 'both']),
  diagnostic: z.boolean().default(false),
  unit: z.string().optional(),
}

const descriptorSchema = z.discriminatedUnion('kind', [
  z.object({
    ...descriptorBase,
    kind: z.literal('integer'),
    min: z.number().int().optional(),
    max: z.number().int().optional(),
  }),
  z.object({
    ...descriptorBase,
    kind: z.literal('temperature'),
    scale: z.number().positive(),
    min: z.number().optional(),
    max: z.number().optional(),
  }),
  z.object({
    ...descriptorBase,
    kind: z.literal('power'),
    min: z.number().int().nonnegative().optional(),
    max: z.number().int().optional(),
  }),
  z.object({
    ...descriptorBase,
    kind: z.literal('enum'),
    options: z.record(z.string().regex(/^\d+$/, 'enum codes must be non-negative integers'), z.string()),
  }),
  z.object({
    ...descriptorBase,
    kind: z.literal('boolean'),
  }),
])

export type ParameterDescriptor = Readonly<z.output<typeof descriptorSchema>>
export type ParameterDescriptorInput = z.input<typeof descriptorSchema>
export type ParameterKind = ParameterDescriptor['kind']
export type Applicability = ParameterDescriptor['appliesTo']

/**
 * Validate a descriptor table and freeze every entry.
 * Throws a ZodError when an entry is malformed.
 */
export function parseParameterTable(raw: unknown): readonly ParameterDescriptor[] {
  const descriptors = z.array(descriptorSchema).parse(raw)
  return Object.freeze(descriptors.map((descriptor) => Object.freeze(descriptor)))
}

export const PARAMETER_TABLE = parseParameterTable(parameterTable)

export const appliesToGeneration = (descriptor: ParameterDescriptor, generation: DeviceGeneration): boolean =>
  descriptor.appliesTo === 'both' || descriptor.appliesTo === generation

/**
 * Lookup over a generation-scoped descriptor set, by name and by wire index.
 */
export class ParameterSchema {
  private readonly byName = new Map<ParameterName, ParameterDescriptor>()
  private readonly byIndex = new Map<number, ParameterDescriptor>()

  constructor(
    readonly descriptors: readonly ParameterDescriptor[],
    readonly generation: DeviceGeneration | null = null,
  ) {
    for (const descriptor of descriptors) {
      if (this.byName.has(descriptor.name)) {
        throw new Error(`Duplicate parameter name in schema: ${descriptor.name}`)
      }
      if (this.byIndex.has(descriptor.wireIndex)) {
        throw new Error(`Duplicate wire index in schema: ${descriptor.wireIndex}`)
      }
      this.byName.set(descriptor.name, descriptor)
      this.byIndex.set(descriptor.wireIndex, descriptor)
    }
  }

  get(name: ParameterName): ParameterDescriptor | undefined {
    return this.byName.get(name)
  }

  getByIndex(wireIndex: number): ParameterDescriptor | undefined {
    return this.byIndex.get(wireIndex)
  }

  has(name: ParameterName): boolean {
    return this.byName.has(name)
  }

  names(): ParameterName[] {
    return [...this.byName.keys()]
  }

  /** Wire index of a parameter this schema must contain */
  indexOf(name: ParameterName): number {
    const descriptor = this.byName.get(name)
    if (!descriptor) {
      throw new Error(`Parameter "${name}" is not part of this schema`)
    }
    return descriptor.wireIndex
  }
}

const schemas = new Map<DeviceGeneration, ParameterSchema>(
  DEVICE_GENERATIONS.map((generation) => [
    generation,
    new ParameterSchema(
      Object.freeze(PARAMETER_TABLE.filter((descriptor) => appliesToGeneration(descriptor, generation))),
      generation,
    ),
  ]),
)

export function schemaFor(generation: DeviceGeneration): ParameterSchema {
  const schema = schemas.get(generation)
  if (!schema) {
    throw new Error(`Unknown device generation: ${generation}`)
  }
  return schema
}

export function descriptorsFor(generation: DeviceGeneration): readonly ParameterDescriptor[] {
  return schemaFor(generation).descriptors
}

export function isParameterName(name: string): name is ParameterName {
  return (PARAMETER_NAMES as readonly string[]).includes(name)
}

/** Generations that know a parameter at all; empty for unknown names */
export function generationsFor(name: ParameterName): DeviceGeneration[] {
  return DEVICE_GENERATIONS.filter((generation) => schemaFor(generation).has(name))
}

/** Parameters whose reply distinguishes a floor+air unit from a floor-only one */
export const AIR_SENSOR_MARKERS: readonly ParameterName[] = ['manualAirTemperature', 'upperAirLimit', 'lowerAirLimit']

/** Present on every firmware; used to tell "old" apart from "no reply at all" */
export const BASELINE_PARAMETER: ParameterName = 'mode'

/**
 * Fields of the live status reply. Temperatures are sixteenths of a degree.
 */
export const STATUS_FIELDS = {
  floorTemperature: 't.1',
  airTemperature: 't.2',
  reportedSetpoint: 't.5',
  operatingMode: 'm.1',
  relay: 'f.0',
  powerFlag: 'f.16',
} as const

export const STATUS_TEMPERATURE_DIVISOR = 16

export const STATUS_OPERATING_MODES: Readonly<Record<string, 'schedule' | 'manual' | 'away'>> = {
  '0': 'schedule',
  '3': 'manual',
  '4': 'away',
}
