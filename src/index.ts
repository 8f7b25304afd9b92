import packageJson from '../package.json' with { type: 'json' }
import { ThermostatBridge } from './bridge.js'
import { loadConfig } from './config.js'
import createLogger from './logger.js'
import Mqtt from './mqtt.js'
import { ThermostatClient } from './thermostat.js'

const appVersion = process.env.APP_VERSION ?? packageJson.version
const logger = createLogger('app')

const main = async () => {
  const config = loadConfig()
  const { device } = config

  logger.info(
    `Starting floor thermostat to MQTT version: "${appVersion}", thermostat ${device.serialNumber} at ${device.host}, poll interval: ${device.pollInterval} seconds`,
  )

  const client = new ThermostatClient({
    host: device.host,
    serialNumber: device.serialNumber,
    generation: device.generation,
    pollIntervalMs: device.pollInterval * 1000,
    requestTimeoutMs: device.requestTimeout * 1000,
    maxBackoffMs: device.maxBackoff * 1000,
    staleAfterMs: device.staleAfter === undefined ? undefined : device.staleAfter * 1000,
  })
  const mqtt = new Mqtt(config.mqtt)
  const bridge = new ThermostatBridge(
    client,
    mqtt,
    {
      serialNumber: device.serialNumber,
      name: device.name ?? `Thermostat ${device.serialNumber}`,
      host: device.host,
    },
    {
      autoDiscovery: config.homeAssistant.autoDiscovery,
      showDiagnostics: device.showDiagnostics,
      showChanges: config.logging.showChanges,
      ignoredKeys: config.logging.ignoredKeys,
    },
  )

  bridge.start()
  client.start()

  let shuttingDown = false
  const shutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    logger.info(`Received ${signal}, shutting down...`)
    bridge.stop()
    await client.stop()
    await mqtt.disconnect()
    process.exit(0)
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Shutdown failed:', error)
        process.exit(1)
      })
    })
  }
}

main().catch((error: unknown) => {
  logger.error('Fatal error:', error)
  process.exit(1)
})
