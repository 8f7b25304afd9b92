import { describe, expect, it } from 'vitest'
import type { HealthStatus } from '../../src/coordinator.js'
import { FloorSensorThermostat } from '../../src/devices/floor-sensor.js'
import { GenerationMismatch, NotReady, ValidationError } from '../../src/errors.js'
import { emptySnapshot } from '../../src/state.js'
import { NEW_PARAMETERS, OLD_PARAMETERS, snapshot } from '../fixtures/device.js'

const info = { serialNumber: 'TEST-0001', name: 'Bathroom floor', host: '192.0.2.10' }
const fresh: HealthStatus = { status: 'fresh', ageMs: 0 }

describe('FloorSensorThermostat', () => {
  const thermostat = new FloorSensorThermostat(info)

  it('should describe the floor-only hardware', () => {
    expect(thermostat.getGeneration()).toBe('old')
    expect(thermostat.getModelName()).toBe('Floor sensor thermostat')
    expect(thermostat.getSupportedControlSources()).toEqual(['floor'])
    expect(thermostat.getTemperatureStep()).toBe(1)
    expect(thermostat.hasAirSensor()).toBe(false)
    expect(thermostat.getSerialNumber()).toBe('TEST-0001')
    expect(thermostat.getName()).toBe('Bathroom floor')
  })

  describe('normalizeState', () => {
    it('should present a heating snapshot', () => {
      expect(thermostat.normalizeState(snapshot('old', OLD_PARAMETERS), fresh)).toEqual({
        serialNumber: 'TEST-0001',
        generation: 'old',
        connectionState: 'connected',
        health: 'fresh',
        mode: 'heat',
        action: 'heating',
        preset: 'manual',
        controlSource: 'floor',
        currentTemperature: 23,
        floorTemperature: 23,
        targetTemperature: 24,
        minTemperature: 10,
        maxTemperature: 40,
        childLock: false,
        confirmed: true,
      })
    })

    it('should show schedule mode as auto with the away setpoint', () => {
      const climate = thermostat.normalizeState(snapshot('old', { ...OLD_PARAMETERS, mode: 'schedule' }), fresh)

      expect(climate.mode).toBe('auto')
      expect(climate.preset).toBe('schedule')
      expect(climate.targetTemperature).toBe(18)
    })

    it('should show a powered-off unit as off without a target', () => {
      const climate = thermostat.normalizeState(snapshot('old', { ...OLD_PARAMETERS, powerOff: true }), fresh)

      expect(climate.mode).toBe('off')
      expect(climate.action).toBe('off')
      expect(climate.targetTemperature).toBeNull()
    })

    it('should show a cooling unit on its schedule as cool', () => {
      const climate = thermostat.normalizeState(
        snapshot('old', { ...OLD_PARAMETERS, mode: 'schedule', coolingMode: true }),
        fresh,
      )

      expect(climate.mode).toBe('cool')
      expect(climate.action).toBe('cooling')
      expect(climate.preset).toBe('schedule')
    })

    it('should show cooling and an idle relay', () => {
      const climate = thermostat.normalizeState(
        snapshot('old', { ...OLD_PARAMETERS, coolingMode: true }, { relayActive: false }),
        fresh,
      )

      expect(climate.mode).toBe('cool')
      expect(climate.action).toBe('idle')
    })

    it('should mark the unit disconnected while degraded', () => {
      const climate = thermostat.normalizeState(snapshot('old', OLD_PARAMETERS), {
        status: 'degraded',
        reason: 'timeout',
        ageMs: 60_000,
      })

      expect(climate.connectionState).toBe('disconnected')
      expect(climate.health).toBe('degraded')
    })

    it('should add diagnostics only when asked', () => {
      const state = snapshot('old', OLD_PARAMETERS)

      expect(thermostat.normalizeState(state, fresh).diagnostics).toBeUndefined()

      const diagnostics = thermostat.normalizeState(state, fresh, { includeDiagnostics: true }).diagnostics ?? {}
      expect(Object.keys(diagnostics)).toHaveLength(17)
      expect(diagnostics.loadPower).toBe(1500)
      expect(diagnostics.sensorType).toBeNull()
      expect(diagnostics).not.toHaveProperty('airCorrection')
    })

    it('should refuse snapshots it cannot present', () => {
      expect(() => thermostat.normalizeState(emptySnapshot(), fresh)).toThrow(NotReady)
      expect(() => thermostat.normalizeState(snapshot('new', NEW_PARAMETERS), fresh)).toThrow(GenerationMismatch)
    })
  })

  describe('transformMqttCommand', () => {
    it('should order commands and turn the unit off last', () => {
      expect(thermostat.transformMqttCommand({ mode: 'off', targetTemperature: 22, preset: 'manual' })).toEqual([
        { action: 'setPreset', preset: 'manual' },
        { action: 'setTargetTemperature', temperature: 22 },
        { action: 'setHvacMode', mode: 'off' },
      ])
    })

    it('should translate floor limits and the child lock', () => {
      expect(thermostat.transformMqttCommand({ childLock: true, floorLimits: { lower: 15, upper: 35 } })).toEqual([
        { action: 'setFloorLimits', lower: 15, upper: 35 },
        { values: { childLock: true } },
      ])
    })

    it('should pass named parameters through and restart last', () => {
      expect(
        thermostat.transformMqttCommand({ restart: true, mode: 'off', parameters: { brightness: 5, lanBlock: false } }),
      ).toEqual([
        { values: { brightness: 5, lanBlock: false } },
        { action: 'setHvacMode', mode: 'off' },
        { restart: true },
      ])
    })

    it('should reject unknown parameter names', () => {
      expect(() => thermostat.transformMqttCommand({ parameters: { fanSpeed: 2 } })).toThrow(
        'Unknown parameter "fanSpeed"',
      )
      expect(() => thermostat.transformMqttCommand({ parameters: {} })).toThrow(ValidationError)
      expect(() => thermostat.transformMqttCommand({ restart: false })).toThrow(ValidationError)
    })

    it('should reject air-sensor features', () => {
      expect(() => thermostat.transformMqttCommand({ controlSource: 'air' })).toThrow(
        'Floor sensor thermostat does not support control source "air"',
      )
      expect(() => thermostat.transformMqttCommand({ airLimits: { lower: 10, upper: 30 } })).toThrow(
        'Floor sensor thermostat has no air sensor limits',
      )
    })

    it('should reject malformed payloads', () => {
      expect(() => thermostat.transformMqttCommand({})).toThrow('Command payload does not contain any supported field')
      expect(() => thermostat.transformMqttCommand({ targetTemperature: '22' })).toThrow(
        'Invalid command payload at "targetTemperature"',
      )
      expect(() => thermostat.transformMqttCommand({ fanSpeed: 'high' })).toThrow(ValidationError)
      expect(() => thermostat.transformMqttCommand('heat')).toThrow(ValidationError)
    })
  })

  describe('generateAutoDiscoveryConfig', () => {
    it('should describe a whole-degree climate entity', () => {
      const config = thermostat.generateAutoDiscoveryConfig('test_thermostats', snapshot('old', OLD_PARAMETERS))

      expect(config).toMatchObject({
        object_id: 'thermostat_TEST-0001',
        uniq_id: 'thermostat_old_TEST-0001',
        device: {
          identifiers: ['TEST-0001'],
          manufacturer: 'Floor heating thermostat',
          model: 'Floor sensor thermostat',
          name: 'Bathroom floor',
        },
        availability_topic: 'test_thermostats/TEST-0001/state',
        mode_command_topic: 'test_thermostats/TEST-0001/command',
        modes: ['off', 'heat', 'cool', 'auto'],
        preset_modes: ['schedule', 'manual'],
        precision: 1,
        temp_step: 1,
        initial: 10,
        min_temp: 10,
        max_temp: 40,
      })
    })

    it('should not double a trailing slash in the prefix', () => {
      const config = thermostat.generateAutoDiscoveryConfig('test_thermostats/', snapshot('old', OLD_PARAMETERS))

      expect(config.temperature_command_topic).toBe('test_thermostats/TEST-0001/command')
    })

    it('should not change when only the target temperature changes', () => {
      const before = thermostat.generateAutoDiscoveryConfig('test_thermostats', snapshot('old', OLD_PARAMETERS))
      const after = thermostat.generateAutoDiscoveryConfig(
        'test_thermostats',
        snapshot('old', { ...OLD_PARAMETERS, manualFloorTemperature: 27 }),
      )

      expect(after).toEqual(before)
    })
  })
})
