import { describe, expect, it } from 'vitest'
import { DecodeError, UnwritableParameter, ValidationError } from '../../src/errors.js'
import {
  decodeStatus,
  decodeTelegram,
  encodeIntent,
  encodeValue,
  fromWireParams,
  isUnknownEnumValue,
  type CommandValue,
  type CommandValues,
  powerFromRaw,
  powerToRaw,
  scaleRaw,
  toWireParams,
  UnknownEnumValue,
  unscaleValue,
} from '../../src/telegram/codec.js'
import {
  DEVICE_GENERATIONS,
  type ParameterDescriptor,
  ParameterSchema,
  parseParameterTable,
  schemaFor,
} from '../../src/telegram/schema.js'

// Small schema with a tenth-degree setpoint and a sparse enum
const schema = new ParameterSchema(
  parseParameterTable([
    {
      wireIndex: 5,
      name: 'manualFloorTemperature',
      kind: 'temperature',
      dataType: 3,
      writable: true,
      appliesTo: 'both',
      scale: 0.1,
    },
    {
      wireIndex: 6,
      name: 'controlType',
      kind: 'enum',
      dataType: 2,
      writable: true,
      appliesTo: 'both',
      options: { '0': 'floor' },
    },
    {
      wireIndex: 60,
      name: 'mode',
      kind: 'enum',
      dataType: 2,
      writable: true,
      appliesTo: 'both',
      options: { '0': 'schedule', '3': 'manual' },
    },
    {
      wireIndex: 31,
      name: 'setTemperature',
      kind: 'temperature',
      dataType: 3,
      writable: false,
      appliesTo: 'both',
      scale: 0.1,
    },
  ]),
)

describe('telegram codec', () => {
  describe('decodeTelegram', () => {
    it('should scale temperatures and map enum codes', () => {
      expect(decodeTelegram({ '5': 215, '6': 0, '60': 3 }, schema)).toEqual({
        manualFloorTemperature: 21.5,
        controlType: 'floor',
        mode: 'manual',
      })
    })

    it('should keep undeclared enum codes as unknown values', () => {
      const decoded = decodeTelegram({ '60': 7 }, schema)

      expect(isUnknownEnumValue(decoded.mode)).toBe(true)
      expect(decoded.mode).toEqual(new UnknownEnumValue(7))
      expect(JSON.stringify(decoded)).toBe('{"mode":"unknown(7)"}')
    })

    it('should skip indices the schema does not know and null values', () => {
      expect(decodeTelegram({ '99': 5, '5': 200, '6': null }, schema)).toEqual({ manualFloorTemperature: 20 })
    })

    it('should accept numeric strings as sent by the device', () => {
      expect(decodeTelegram({ '5': '215', '60': '0' }, schema)).toEqual({
        manualFloorTemperature: 21.5,
        mode: 'schedule',
      })
    })

    it('should reject non-numeric values on known indices', () => {
      expect(() => decodeTelegram({ '5': 'warm' }, schema)).toThrow(DecodeError)
    })

    it('should decode booleans and power from the generation schema', () => {
      expect(decodeTelegram({ '17': 151, '124': 1, '125': 0 }, schemaFor('old'))).toEqual({
        loadPower: 1520,
        childLock: true,
        powerOff: false,
      })
    })
  })

  describe('encodeIntent', () => {
    it('should encode only the given fields', () => {
      expect(encodeIntent({ manualFloorTemperature: 22 }, schema)).toEqual({ '5': 220 })
      expect(encodeIntent({ mode: 'schedule' }, schema)).toEqual({ '60': 0 })
    })

    it('should reject read-only parameters', () => {
      expect(() => encodeIntent({ setTemperature: 20 }, schema)).toThrow(UnwritableParameter)
    })

    it('should reject parameters of the other generation', () => {
      expect(() => encodeIntent({ upperAirLimit: 30 }, schemaFor('old'))).toThrow(ValidationError)
    })

    it('should reject enum names outside the option set', () => {
      expect(() => encodeValue(schemaFor('old').get('controlType') ?? missing(), 'air')).toThrow(
        'Parameter "controlType" expects one of floor, got "air"',
      )
    })
  })

  describe('power conversion', () => {
    it('should count in 10 W steps up to 1500 W and 20 W steps above', () => {
      expect(powerFromRaw(150)).toBe(1500)
      expect(powerFromRaw(151)).toBe(1520)
      expect(powerToRaw(1500)).toBe(150)
      expect(powerToRaw(1520)).toBe(151)
      expect(powerToRaw(7500)).toBe(450)
    })
  })

  describe('wire params', () => {
    it('should attach the declared data type to every value', () => {
      expect(toWireParams({ '5': 220, '125': 1 }, schemaFor('new'))).toEqual([
        [5, 3, '220'],
        [125, 7, '1'],
      ])
    })

    it('should reject indices outside the schema', () => {
      expect(() => toWireParams({ '999': 1 }, schemaFor('new'))).toThrow(ValidationError)
    })

    it('should unpack a parameter reply', () => {
      expect(
        fromWireParams({
          sn: 'TEST-0001',
          par: [
            [2, 2, '1'],
            ['5', 3, '240'],
          ],
        }),
      ).toEqual({ '2': '1', '5': '240' })
    })

    it('should reject malformed parameter replies', () => {
      expect(() => fromWireParams({ sn: 'TEST-0001' })).toThrow(DecodeError)
      expect(() => fromWireParams({ par: [[2, 2]] })).toThrow(/Malformed parameter reply/)
    })
  })

  describe('decodeStatus', () => {
    const block = { 't.1': 368, 't.2': 352, 't.5': 384, 'm.1': 3, 'f.0': 1, 'f.16': 0 }

    it('should convert sixteenths of a degree and flags', () => {
      expect(decodeStatus(block, 'new')).toEqual({
        floorTemperature: 23,
        airTemperature: 22,
        reportedSetpoint: 24,
        operatingMode: 'manual',
        relayActive: true,
        powerReportedOn: true,
      })
    })

    it('should leave the air temperature out for old units', () => {
      const telemetry = decodeStatus(block, 'old')
      expect('airTemperature' in telemetry).toBe(false)
      expect(telemetry.floorTemperature).toBe(23)
    })

    it('should report missing fields as null and odd modes as unknown', () => {
      const telemetry = decodeStatus({ 't.1': '360', 'm.1': 9, 'f.16': 1 }, 'old')

      expect(telemetry.floorTemperature).toBe(22.5)
      expect(telemetry.reportedSetpoint).toBeNull()
      expect(telemetry.relayActive).toBeNull()
      expect(telemetry.powerReportedOn).toBe(false)
      expect(String(telemetry.operatingMode)).toBe('unknown(9)')
    })

    it('should reject a status reply that is not an object', () => {
      expect(() => decodeStatus('offline', 'old')).toThrow(DecodeError)
    })

    it('should ignore fields it does not read, whatever their shape', () => {
      const telemetry = decodeStatus({ ...block, 't.1': '368', 'o.1': [1, 2], 'w.0': { rssi: -60 } }, 'old')

      expect(telemetry.floorTemperature).toBe(23)
      expect(telemetry.relayActive).toBe(true)
    })

    it('should reject a structured value in a field it reads', () => {
      expect(() => decodeStatus({ ...block, 't.1': [368] }, 'old')).toThrow('Field t.1 carries a non-numeric value: [368]')
    })
  })

  describe('round trip over the parameter table', () => {
    const range = (from: number, to: number) => Array.from({ length: to - from + 1 }, (_, i) => from + i)

    // Every value the device can hold within the declared limits
    const legalValues = (descriptor: ParameterDescriptor): CommandValue[] => {
      switch (descriptor.kind) {
        case 'boolean':
          return [false, true]
        case 'enum':
          return Object.values(descriptor.options)
        case 'integer':
          return range(descriptor.min ?? 0, descriptor.max ?? 0)
        case 'temperature':
          return range(
            unscaleValue(descriptor.min ?? 0, descriptor.scale),
            unscaleValue(descriptor.max ?? 0, descriptor.scale),
          ).map((raw) => scaleRaw(raw, descriptor.scale))
        case 'power':
          return range(powerToRaw(descriptor.min ?? 0), powerToRaw(descriptor.max ?? 0)).map(powerFromRaw)
      }
    }

    for (const generation of DEVICE_GENERATIONS) {
      const generationSchema = schemaFor(generation)
      const writable = generationSchema.descriptors.filter((descriptor) => descriptor.writable)

      it.each(writable.map((descriptor): [string, ParameterDescriptor] => [descriptor.name, descriptor]))(
        `should decode what it encodes for ${generation} %s`,
        (_name, descriptor) => {
          for (const value of legalValues(descriptor)) {
            const values: CommandValues = {}
            values[descriptor.name] = value

            const decoded = decodeTelegram(encodeIntent(values, generationSchema), generationSchema)

            expect(decoded[descriptor.name]).toBe(value)
          }
        },
      )
    }
  })
})

function missing(): never {
  throw new Error('descriptor missing')
}
