import { Cache, cache as sharedCache } from './cache.js'
import { type BaseThermostat, type DeviceRequest, isRestartRequest, type ThermostatInfo } from './devices/base.js'
import { ThermostatFactory } from './devices/factory.js'
import { formatError } from './errors.js'
import createLogger from './logger.js'
import type { IMqtt } from './mqtt.js'
import { formatStateDifferences, getStateDifferences } from './state-differences.js'
import type { ThermostatClient } from './thermostat.js'

const logger = createLogger('bridge')

export type BridgeClient = Pick<
  ThermostatClient,
  'getState' | 'healthStatus' | 'issueCommand' | 'restart' | 'onUpdate' | 'onPhaseChange'
>

export interface BridgeOptions {
  autoDiscovery: boolean
  showDiagnostics: boolean
  showChanges: boolean
  ignoredKeys: string[]
}

/**
 * Connects one thermostat client to MQTT: publishes its climate state and
 * discovery config on change, and turns command messages into client commands
 */
export class ThermostatBridge {
  private device: BaseThermostat | null = null
  private readonly subscriptions: Array<() => void> = []
  private readonly commandPath: string
  private readonly statePath: string

  constructor(
    private readonly client: BridgeClient,
    private readonly mqtt: IMqtt,
    private readonly info: ThermostatInfo,
    private readonly options: BridgeOptions,
    private readonly cache: Cache = sharedCache,
  ) {
    this.commandPath = `${info.serialNumber}/command`
    this.statePath = `${info.serialNumber}/state`
  }

  public getDevice(): BaseThermostat | null {
    return this.device
  }

  public start(): void {
    this.subscriptions.push(
      this.client.onUpdate(() => this.publishState()),
      this.client.onPhaseChange(() => this.publishState()),
    )
    this.mqtt.subscribe(this.commandPath, (topic, message) => {
      logger.info('Received command on topic:', topic, 'Message:', message.toString())
      void this.handleCommand(message.toString())
    })
  }

  public stop(): void {
    for (const unsubscribe of this.subscriptions.splice(0)) {
      unsubscribe()
    }
    this.mqtt.unsubscribe(this.commandPath)
  }

  /**
   * Publish the current snapshot if it differs from what was last published
   */
  public publishState(): void {
    const state = this.client.getState()
    if (state.generation === null) {
      return
    }
    if (this.device?.getGeneration() !== state.generation) {
      this.device = ThermostatFactory.create(state.generation, this.info)
      logger.info(`Thermostat ${this.info.serialNumber} identified as ${this.device.getModelName()}`)
    }
    const device = this.device
    const keys = this.cache.cacheKey(this.info.serialNumber)

    if (this.options.autoDiscovery) {
      const discovery = device.generateAutoDiscoveryConfig(this.mqtt.topicPrefix, state)
      if (!this.cache.matchByValue(keys.autoDiscovery, discovery)) {
        this.mqtt.autoDiscovery(this.info.serialNumber, JSON.stringify(discovery))
      }
    }

    const climate = device.normalizeState(state, this.client.healthStatus(), {
      includeDiagnostics: this.options.showDiagnostics,
    })
    const cached = this.cache.get(keys.state)
    const previous = typeof cached === 'object' && cached !== null ? cached : null

    if (this.cache.matchByValue(keys.state, climate)) {
      logger.debug('State checked, no changes detected')
      return
    }

    if (previous) {
      const differences = getStateDifferences(previous, climate, this.options.ignoredKeys)
      if (Object.keys(differences).length > 0) {
        logger.info(
          this.options.showChanges
            ? `State changed for thermostat ${this.info.serialNumber}: ${formatStateDifferences(differences)}`
            : `State changed for thermostat ${this.info.serialNumber}`,
        )
      }
    }
    this.mqtt.publish(this.statePath, JSON.stringify(climate))
  }

  /**
   * Apply a command message. Commands run one after the other and stop at
   * the first failure; nothing is thrown back to the MQTT client.
   */
  public async handleCommand(message: string): Promise<void> {
    let payload: unknown
    try {
      payload = JSON.parse(message)
    } catch (error) {
      logger.error(`Ignoring command that is not valid JSON (${formatError(error)}):`, message)
      return
    }

    const device = this.device
    if (!device) {
      logger.warn(`Ignoring command for ${this.info.serialNumber}, thermostat is not ready yet`)
      return
    }

    let commands: DeviceRequest[]
    try {
      commands = device.transformMqttCommand(payload)
    } catch (error) {
      logger.error(`Invalid command for ${this.info.serialNumber}: ${formatError(error)}`)
      return
    }

    for (const command of commands) {
      const result = isRestartRequest(command)
        ? await this.client.restart()
        : await this.client.issueCommand(command)
      if (!result.ok) {
        logger.error(`Command for ${this.info.serialNumber} failed: ${formatError(result.error)}`)
        return
      }
    }
  }
}
