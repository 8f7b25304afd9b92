import type { HealthStatus } from '../coordinator.js'
import type { DeviceGeneration } from '../telegram/schema.js'
import type { ClimateState } from '../types/climate.js'
import type { ControlSource, DeviceState } from '../types/state.js'
import { BaseThermostat, type NormalizeOptions } from './base.js'

/**
 * Newer thermostat generation with floor and air probes.
 * Regulation can follow either probe, or the air with the floor as a limit.
 */
export class AirSensorThermostat extends BaseThermostat {
  public getGeneration(): DeviceGeneration {
    return 'new'
  }

  public getModelName(): string {
    return 'Floor and air sensor thermostat'
  }

  public getSupportedControlSources(): ControlSource[] {
    return ['floor', 'air', 'airWithFloorLimit']
  }

  public getTemperatureStep(): number {
    return 0.5
  }

  public normalizeState(state: DeviceState, health: HealthStatus, options: NormalizeOptions = {}): ClimateState {
    return {
      ...super.normalizeState(state, health, options),
      airTemperature: state.telemetry.airTemperature ?? null,
    }
  }
}
