import mqtt, { type IClientPublishOptions, type MqttClient } from 'mqtt'
import type { MqttConfig } from './config.js'
import createLogger from './logger.js'

const logger = createLogger('mqtt')

export type MessageHandler = (topic: string, message: Buffer) => void

export interface IMqtt {
  topicPrefix: string
  resolveTopic(path: string): string
  publish(path: string, message: string, options?: IClientPublishOptions): void
  autoDiscovery(serialNumber: string, message: string, options?: IClientPublishOptions): void
  subscribe(path: string, callback: MessageHandler): void
  unsubscribe(path: string): void
  disconnect(): Promise<void>
}

class Mqtt implements IMqtt {
  public readonly client: MqttClient
  public readonly topicPrefix: string
  private readonly defaultOptions: IClientPublishOptions
  private readonly qos: 0 | 1 | 2

  // Exact-topic router: topic -> handler(topic, payload)
  private readonly topicHandlers = new Map<string, MessageHandler>()

  constructor(config: MqttConfig) {
    this.topicPrefix = `${config.topicPrefix}thermostats`
    this.qos = config.qos
    this.defaultOptions = {
      retain: config.retain,
      qos: config.qos,
    }

    this.client = mqtt.connect(config.url, {
      clientId: config.clientId ?? `${config.username ?? 'floor'}-thermostat`,
      username: config.username,
      password: config.password,
      clean: true,
    })

    this.client
      .on('connect', () => {
        logger.info(`Connected to MQTT broker: ${config.url}`)
      })
      .on('error', (error) => {
        logger.error('MQTT connection error:', error)
      })
      .on('reconnect', () => {
        logger.info('Reconnecting to MQTT broker...')
      })
      .on('close', () => {
        logger.info('MQTT connection closed')
      })
      .on('offline', () => {
        logger.warn('MQTT client is offline')
      })
      .on('message', (incomingTopic, message) => this.route(incomingTopic, message))
  }

  private route(topic: string, message: Buffer) {
    const handler = this.topicHandlers.get(topic)
    if (!handler) return

    logger.debug('Received message on topic:', topic, 'Message:', message.toString())
    try {
      handler(topic, message)
    } catch (error) {
      logger.error('Handler error for topic', topic, error)
    }
  }

  private publishTo(topic: string, message: string, options?: IClientPublishOptions) {
    const publishOptions = {
      ...this.defaultOptions,
      ...options,
    }
    logger.debug('Publishing to topic:', topic, 'Message:', message)
    this.client.publish(topic, message, publishOptions, (error) => {
      if (error) {
        logger.error('Error publishing message:', error)
      } else {
        logger.debug(`Message published to topic "${topic}"`)
      }
    })
  }

  public resolveTopic(path: string): string {
    return `${this.topicPrefix}/${path}`
  }

  public publish(path: string, message: string, options?: IClientPublishOptions) {
    this.publishTo(this.resolveTopic(path), message, options)
  }

  public autoDiscovery(serialNumber: string, message: string, options?: IClientPublishOptions) {
    logger.info(`Publishing auto-discovery config for thermostat: ${serialNumber}`)
    this.publishTo(`homeassistant/climate/${serialNumber}/config`, message, {
      ...options,
      retain: true,
      qos: 2,
    })
  }

  public subscribe(path: string, callback: MessageHandler) {
    const topic = this.resolveTopic(path)
    logger.debug('Subscribing to topic:', topic)

    this.client.subscribe(topic, { qos: this.qos }, (error) => {
      if (error) {
        logger.error('Error subscribing to topic:', error)
        return
      }
      logger.info(`Subscribed to topic "${topic}" successfully`)
    })
    this.topicHandlers.set(topic, callback)
  }

  public unsubscribe(path: string) {
    const topic = this.resolveTopic(path)
    logger.debug('Unsubscribing from topic:', topic)
    this.topicHandlers.delete(topic)

    this.client.unsubscribe(topic, (error) => {
      if (error) {
        logger.error('Error unsubscribing from topic:', error)
      } else {
        logger.info(`Unsubscribed from topic "${topic}" successfully`)
      }
    })
  }

  public disconnect(): Promise<void> {
    return new Promise((resolve) => {
      this.client.end(false, {}, () => {
        logger.info('Disconnected from MQTT broker')
        resolve()
      })
    })
  }
}

export default Mqtt
