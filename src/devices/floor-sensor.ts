import type { DeviceGeneration } from '../telegram/schema.js'
import type { ControlSource } from '../types/state.js'
import { BaseThermostat } from './base.js'

/**
 * Older thermostat generation with a single floor probe.
 * Setpoints are whole degrees and regulation always follows the floor.
 */
export class FloorSensorThermostat extends BaseThermostat {
  public getGeneration(): DeviceGeneration {
    return 'old'
  }

  public getModelName(): string {
    return 'Floor sensor thermostat'
  }

  public getSupportedControlSources(): ControlSource[] {
    return ['floor']
  }

  public getTemperatureStep(): number {
    return 1
  }
}
