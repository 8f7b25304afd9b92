import createLogger from '../logger.js'
import { DEVICE_GENERATIONS, type DeviceGeneration } from '../telegram/schema.js'
import { AirSensorThermostat } from './air-sensor.js'
import type { BaseThermostat, ThermostatInfo } from './base.js'
import { FloorSensorThermostat } from './floor-sensor.js'

const logger = createLogger('factory')

/**
 * Picks the device class matching the detected hardware generation
 */
export class ThermostatFactory {
  public static create(generation: DeviceGeneration, info: ThermostatInfo): BaseThermostat {
    logger.debug(`Creating thermostat instance for ${info.serialNumber}, generation: ${generation}`)

    switch (generation) {
      case 'old':
        return new FloorSensorThermostat(info)
      case 'new':
        return new AirSensorThermostat(info)
    }
  }

  public static getSupportedGenerations(): readonly DeviceGeneration[] {
    return DEVICE_GENERATIONS
  }
}
