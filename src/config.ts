import fs from 'node:fs'
import path from 'node:path'
import yaml from 'yaml'
import { z } from 'zod'

const deviceSchema = z.object({
  host: z.string().min(1, 'device.host is required'),
  serialNumber: z.string().min(1, 'device.serialNumber is required'),
  name: z.string().optional(),
  generation: z.enum(['auto', 'old', 'new']).default('auto'),
  pollInterval: z
    .number()
    .int()
    .min(10, 'device.pollInterval must be at least 10 seconds')
    .max(300, 'device.pollInterval should not exceed 300 seconds')
    .default(30),
  requestTimeout: z
    .number()
    .int()
    .min(1, 'device.requestTimeout must be at least 1 second')
    .max(60, 'device.requestTimeout should not exceed 60 seconds')
    .default(5),
  staleAfter: z.number().int().min(10, 'device.staleAfter must be at least 10 seconds').optional(),
  maxBackoff: z
    .number()
    .int()
    .min(5, 'device.maxBackoff must be at least 5 seconds')
    .max(3600, 'device.maxBackoff should not exceed 3600 seconds')
    .default(300),
  showDiagnostics: z.boolean().default(false),
})

const configSchema = z.object({
  device: deviceSchema,
  mqtt: z.object({
    url: z.string().regex(/^mqtts?:\/\/.+/, 'mqtt.url must start with mqtt:// or mqtts://'),
    clientId: z.string().optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    topicPrefix: z.string().default(''),
    retain: z.boolean().default(false),
    qos: z.union([z.literal(0), z.literal(1), z.literal(2)]).default(0),
  }),
  homeAssistant: z
    .object({
      autoDiscovery: z.boolean().default(true),
    })
    .default({}),
  logging: z
    .object({
      showChanges: z.boolean().default(true),
      ignoredKeys: z.array(z.string()).default([]),
    })
    .default({}),
})

export type AppConfig = z.infer<typeof configSchema>
export type MqttConfig = AppConfig['mqtt']
export type DeviceConfig = AppConfig['device']

const booleanString = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val) => val.toLowerCase() === 'true')

const envSchema = z.object({
  THERMOSTAT_HOST: z.string().min(1),
  THERMOSTAT_SERIAL: z.string().min(1),
  THERMOSTAT_NAME: z.string().optional(),
  THERMOSTAT_GENERATION: z.enum(['auto', 'old', 'new']).default('auto'),
  THERMOSTAT_POLL_INTERVAL: z.coerce
    .number()
    .int()
    .min(10, 'THERMOSTAT_POLL_INTERVAL must be at least 10 seconds')
    .max(300, 'THERMOSTAT_POLL_INTERVAL should not exceed 300 seconds')
    .default(30),
  THERMOSTAT_REQUEST_TIMEOUT: z.coerce.number().int().min(1).max(60).default(5),
  THERMOSTAT_SHOW_DIAGNOSTICS: booleanString('false'),
  MQTT_URL: z.string(),
  MQTT_USERNAME: z.string().optional(),
  MQTT_PASSWORD: z.string().optional(),
  MQTT_CLIENT_ID: z.string().default('floor-thermostat'),
  MQTT_TOPIC_PREFIX: z.string().default('floor_'),
  MQTT_RETAIN: booleanString('false'),
  MQTT_QOS: z.coerce.number().int().min(0).max(2).default(2),
  HOME_ASSISTANT_AUTO_DISCOVERY: booleanString('true'),
  LOGGING_SHOW_CHANGES: booleanString('true'),
  LOGGING_IGNORED_KEYS: z
    .string()
    .default('')
    .transform((val) => (val ? val.split(',').map((k) => k.trim()) : [])),
})

// - CONFIG_FILE_OVERRIDE: explicitly set config file
// - Tests: tests/config.yml (committed to repo)
// - Production: config.yml
export const getConfigFilename = (): string => {
  if (process.env.CONFIG_FILE_OVERRIDE) {
    return process.env.CONFIG_FILE_OVERRIDE
  }
  if (process.env.VITEST || process.env.NODE_ENV === 'test') {
    return 'tests/config.yml'
  }
  return 'config.yml'
}

const isTest = () => Boolean(process.env.VITEST) || process.env.NODE_ENV === 'test'

const reportIssues = (heading: string, error: z.ZodError) => {
  console.error(heading)
  for (const issue of error.issues) {
    console.error(`  - ${issue.path.join('.')}: ${issue.message}`)
  }
}

/**
 * Write a config file from environment variables.
 * Returns false when the environment is incomplete.
 */
export function createConfigFromEnv(configPath: string): boolean {
  console.info('Config file not found. Creating from environment variables...')

  const parsed = envSchema.safeParse(process.env)
  if (!parsed.success) {
    reportIssues('Environment variable validation failed:', parsed.error)
    return false
  }
  const env = parsed.data

  const content = yaml.stringify({
    device: {
      host: env.THERMOSTAT_HOST,
      serialNumber: env.THERMOSTAT_SERIAL,
      ...(env.THERMOSTAT_NAME ? { name: env.THERMOSTAT_NAME } : {}),
      generation: env.THERMOSTAT_GENERATION,
      pollInterval: env.THERMOSTAT_POLL_INTERVAL,
      requestTimeout: env.THERMOSTAT_REQUEST_TIMEOUT,
      showDiagnostics: env.THERMOSTAT_SHOW_DIAGNOSTICS,
    },
    mqtt: {
      clientId: env.MQTT_CLIENT_ID,
      url: env.MQTT_URL,
      ...(env.MQTT_USERNAME ? { username: env.MQTT_USERNAME } : {}),
      ...(env.MQTT_PASSWORD ? { password: env.MQTT_PASSWORD } : {}),
      topicPrefix: env.MQTT_TOPIC_PREFIX,
      retain: env.MQTT_RETAIN,
      qos: env.MQTT_QOS,
    },
    homeAssistant: {
      autoDiscovery: env.HOME_ASSISTANT_AUTO_DISCOVERY,
    },
    logging: {
      showChanges: env.LOGGING_SHOW_CHANGES,
      ignoredKeys: env.LOGGING_IGNORED_KEYS,
    },
  })

  fs.writeFileSync(configPath, content, 'utf8')
  console.info('Config file created successfully.')
  return true
}

export function parseConfig(raw: unknown): AppConfig {
  const parsed = configSchema.safeParse(raw)
  if (!parsed.success) {
    reportIssues('Configuration validation failed:', parsed.error)
    throw parsed.error
  }
  return parsed.data
}

export function loadConfig(configPath = path.resolve(process.cwd(), getConfigFilename())): AppConfig {
  if (!fs.existsSync(configPath) && !createConfigFromEnv(configPath)) {
    if (!isTest()) {
      process.exit(1)
    }
    throw new Error(`Config file ${configPath} is missing and could not be created from the environment`)
  }

  const raw: unknown = yaml.parse(fs.readFileSync(configPath, 'utf8'))
  try {
    return parseConfig(raw)
  } catch (error) {
    if (!isTest()) {
      process.exit(1)
    }
    throw error
  }
}
