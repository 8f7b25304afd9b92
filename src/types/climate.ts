import type { Preset } from '../commands.js'
import type { DeviceGeneration } from '../telegram/schema.js'
import type { HAClimateAction, HAClimateMode } from './homeassistant.js'
import type { ControlSource } from './state.js'

export type ConnectionState = 'connected' | 'disconnected'
export type HealthState = 'fresh' | 'stale' | 'degraded'

/**
 * Climate view of a thermostat snapshot, as published over MQTT
 */
export interface ClimateState {
  serialNumber: string
  generation: DeviceGeneration
  connectionState: ConnectionState
  health: HealthState

  mode: HAClimateMode
  action: HAClimateAction
  preset: Preset | null
  controlSource: ControlSource

  currentTemperature: number | null
  floorTemperature: number | null
  /** Floor+air units only */
  airTemperature?: number | null
  targetTemperature: number | null
  minTemperature: number
  maxTemperature: number

  childLock: boolean | null
  /** False until a poll confirms the last write */
  confirmed: boolean

  diagnostics?: Record<string, number | boolean | string | null>
}
