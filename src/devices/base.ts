import { z } from 'zod'
import type { CommandIntent, HvacMode, Preset, ThermostatCommand } from '../commands.js'
import type { HealthStatus } from '../coordinator.js'
import { GenerationMismatch, NotReady, ValidationError } from '../errors.js'
import { readBoolean } from '../state.js'
import { type DeviceGeneration, isParameterName } from '../telegram/schema.js'
import type { ClimateState } from '../types/climate.js'
import type { HAClimateDiscoveryConfig, HAClimateMode } from '../types/homeassistant.js'
import type { ControlSource, DeviceState } from '../types/state.js'
import { collectDiagnostics, toConnectionState, toHvacAction, toHvacMode, toPreset } from './climate.js'

const MANUFACTURER = 'Floor heating thermostat'

export interface ThermostatInfo {
  serialNumber: string
  name: string
  host: string
}

export interface NormalizeOptions {
  includeDiagnostics?: boolean
}

const limitsSchema = z.object({
  lower: z.number().finite(),
  upper: z.number().finite(),
})

const mqttCommandSchema = z
  .object({
    mode: z.enum(['off', 'heat', 'cool', 'auto']).optional(),
    preset: z.enum(['schedule', 'manual']).optional(),
    targetTemperature: z.number().finite().optional(),
    controlSource: z.enum(['floor', 'air', 'airWithFloorLimit']).optional(),
    childLock: z.boolean().optional(),
    floorLimits: limitsSchema.optional(),
    airLimits: limitsSchema.optional(),
    // Raw parameter writes by name, for settings without a climate field
    parameters: z.record(z.union([z.number().finite(), z.boolean(), z.string()])).optional(),
    restart: z.literal(true).optional(),
  })
  .strict()

export type MqttCommand = z.infer<typeof mqttCommandSchema>

export type RestartRequest = { restart: true }

/** What one MQTT command payload asks of the client, in order */
export type DeviceRequest = ThermostatCommand | RestartRequest

export const isRestartRequest = (request: DeviceRequest): request is RestartRequest => 'restart' in request

/**
 * Base class for the thermostat generations.
 * Each generation extends this class and states what its hardware supports.
 */
export abstract class BaseThermostat {
  protected readonly info: ThermostatInfo

  constructor(info: ThermostatInfo) {
    this.info = info
  }

  public getSerialNumber(): string {
    return this.info.serialNumber
  }

  public getName(): string {
    return this.info.name
  }

  public getInfo(): ThermostatInfo {
    return this.info
  }

  abstract getGeneration(): DeviceGeneration

  /**
   * Model name, used in discovery payloads and logs
   */
  abstract getModelName(): string

  abstract getSupportedControlSources(): ControlSource[]

  /** Smallest target temperature step offered to the user */
  abstract getTemperatureStep(): number

  public hasAirSensor(): boolean {
    return this.getGeneration() === 'new'
  }

  public getSupportedModes(): HAClimateMode[] {
    return ['off', 'heat', 'cool', 'auto']
  }

  public getSupportedPresets(): Preset[] {
    return ['schedule', 'manual']
  }

  public getTemperatureRange(state: DeviceState): { min: number; max: number; initial: number } {
    const { min, max } = state.derived.setpointRange
    return { min, max, initial: min }
  }

  /**
   * Climate view of a snapshot for publishing
   */
  public normalizeState(state: DeviceState, health: HealthStatus, options: NormalizeOptions = {}): ClimateState {
    if (state.generation === null) {
      throw new NotReady()
    }
    if (state.generation !== this.getGeneration()) {
      throw new GenerationMismatch(
        `${this.getModelName()} cannot present a "${state.generation}" snapshot`,
      )
    }

    const range = this.getTemperatureRange(state)
    const climate: ClimateState = {
      serialNumber: this.info.serialNumber,
      generation: state.generation,
      connectionState: toConnectionState(health),
      health: health.status,
      mode: toHvacMode(state),
      action: toHvacAction(state),
      preset: toPreset(state),
      controlSource: state.derived.controlSource,
      currentTemperature: state.derived.currentTemperature,
      floorTemperature: state.telemetry.floorTemperature,
      targetTemperature: state.derived.targetTemperature,
      minTemperature: range.min,
      maxTemperature: range.max,
      childLock: readBoolean(state.parameters, 'childLock'),
      confirmed: state.confirmed,
    }
    if (options.includeDiagnostics) {
      climate.diagnostics = collectDiagnostics(state)
    }
    return climate
  }

  /**
   * Translate an MQTT command payload into client requests, in the order they
   * should be applied. Turning the unit off comes after every setting, and a
   * restart after that.
   */
  public transformMqttCommand(payload: unknown): DeviceRequest[] {
    const parsed = mqttCommandSchema.safeParse(payload)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new ValidationError(
        `Invalid command payload${issue ? ` at "${issue.path.join('.') || 'payload'}": ${issue.message}` : ''}`,
      )
    }
    const command = parsed.data

    if (command.controlSource && !this.getSupportedControlSources().includes(command.controlSource)) {
      throw new ValidationError(
        `${this.getModelName()} does not support control source "${command.controlSource}"`,
        'controlType',
      )
    }
    if (command.airLimits && !this.hasAirSensor()) {
      throw new ValidationError(`${this.getModelName()} has no air sensor limits`, 'lowerAirLimit')
    }

    const commands: DeviceRequest[] = []
    const mode: HvacMode | undefined = command.mode

    if (command.controlSource) {
      commands.push({ action: 'setControlType', controlType: command.controlSource })
    }
    if (command.floorLimits) {
      commands.push({ action: 'setFloorLimits', ...command.floorLimits })
    }
    if (command.airLimits) {
      commands.push({ action: 'setAirLimits', ...command.airLimits })
    }
    if (mode && mode !== 'off') {
      commands.push({ action: 'setHvacMode', mode })
    }
    if (command.preset) {
      commands.push({ action: 'setPreset', preset: command.preset })
    }
    if (command.targetTemperature !== undefined) {
      commands.push({ action: 'setTargetTemperature', temperature: command.targetTemperature })
    }
    if (command.childLock !== undefined) {
      commands.push({ values: { childLock: command.childLock } })
    }
    if (command.parameters) {
      commands.push(this.parameterIntent(command.parameters))
    }
    if (mode === 'off') {
      commands.push({ action: 'setHvacMode', mode })
    }
    if (command.restart) {
      commands.push({ restart: true })
    }

    if (commands.length === 0) {
      throw new ValidationError('Command payload does not contain any supported field')
    }
    return commands
  }

  private parameterIntent(parameters: Record<string, number | boolean | string>): CommandIntent {
    const intent: CommandIntent = { values: {} }
    for (const [name, value] of Object.entries(parameters)) {
      if (!isParameterName(name)) {
        throw new ValidationError(`Unknown parameter "${name}"`, name)
      }
      intent.values[name] = value
    }
    if (Object.keys(intent.values).length === 0) {
      throw new ValidationError('Command "parameters" does not name any parameter')
    }
    return intent
  }

  /**
   * Generate Home Assistant MQTT auto-discovery configuration
   */
  public generateAutoDiscoveryConfig(topicPrefix: string, state: DeviceState): HAClimateDiscoveryConfig {
    const range = this.getTemperatureRange(state)
    const prefix = topicPrefix.endsWith('/') ? topicPrefix : `${topicPrefix}/`
    const serialNumber = this.info.serialNumber
    const stateTopic = `${prefix}${serialNumber}/state`
    const commandTopic = `${prefix}${serialNumber}/command`

    return {
      name: '',
      object_id: `thermostat_${serialNumber}`,
      uniq_id: `thermostat_${this.getGeneration()}_${serialNumber}`,
      device: {
        identifiers: [serialNumber],
        manufacturer: MANUFACTURER,
        model: this.getModelName(),
        name: this.info.name,
      },
      availability_topic: stateTopic,
      availability_template: '{{ value_json.connectionState }}',
      payload_available: 'connected',
      payload_not_available: 'disconnected',
      json_attributes_topic: stateTopic,
      modes: this.getSupportedModes(),
      mode_state_topic: stateTopic,
      mode_state_template: '{{ value_json.mode }}',
      mode_command_topic: commandTopic,
      mode_command_template: '{ "mode": "{{ value }}" }',
      preset_modes: this.getSupportedPresets(),
      preset_mode_state_topic: stateTopic,
      preset_mode_value_template: '{{ value_json.preset }}',
      preset_mode_command_topic: commandTopic,
      preset_mode_command_template: '{ "preset": "{{ value }}" }',
      action_topic: stateTopic,
      action_template: '{{ value_json.action }}',
      precision: this.getTemperatureStep() < 1 ? 0.1 : 1,
      temp_step: this.getTemperatureStep(),
      temperature_unit: 'C',
      initial: range.initial,
      min_temp: range.min,
      max_temp: range.max,
      current_temperature_topic: stateTopic,
      current_temperature_template: '{{ value_json.currentTemperature }}',
      temperature_state_topic: stateTopic,
      temperature_state_template: '{{ value_json.targetTemperature }}',
      temperature_command_topic: commandTopic,
      temperature_command_template: '{ "targetTemperature": {{ value }} }',
    }
  }
}
