import { AuthBlocked, ClientStopped, DetectionFailed, formatError, GenerationMismatch } from './errors.js'
import createLogger from './logger.js'
import type { RawScalar, RawTelegram } from './telegram/codec.js'
import { AIR_SENSOR_MARKERS, BASELINE_PARAMETER, type DeviceGeneration, schemaFor } from './telegram/schema.js'
import type { Transport } from './transport.js'

const logger = createLogger('detector')

// Marker indices are read through the floor+air schema, which is the superset
const probeSchema = schemaFor('new')

/**
 * Valid means the device answered with a real number; some firmware echoes
 * fields it does not support as null, "" or 0.
 */
function hasValidValue(raw: RawTelegram, index: number, allowZero: boolean): boolean {
  const value: RawScalar | undefined = raw[String(index)]
  if (value === undefined || value === null || typeof value === 'boolean') return false
  const numeric = typeof value === 'number' ? value : value.trim() === '' ? Number.NaN : Number(value)
  if (!Number.isFinite(numeric)) return false
  return allowZero ? true : numeric > 0
}

export function hasAirSensorMarker(raw: RawTelegram): boolean {
  return AIR_SENSOR_MARKERS.some((name) => hasValidValue(raw, probeSchema.indexOf(name), false))
}

/**
 * Classify a parameter telegram. Returns null when the reply carries no
 * usable signal either way.
 */
export function classifyGeneration(raw: RawTelegram): DeviceGeneration | null {
  if (hasAirSensorMarker(raw)) {
    return 'new'
  }
  if (hasValidValue(raw, probeSchema.indexOf(BASELINE_PARAMETER), true)) {
    return 'old'
  }
  return null
}

/**
 * Probe the device once and decide its generation.
 * Local-control lockout is passed through as is; every other failure becomes DetectionFailed.
 */
export async function detectGeneration(transport: Transport): Promise<DeviceGeneration> {
  let raw: RawTelegram
  try {
    raw = await transport.readParameters()
  } catch (error) {
    if (error instanceof AuthBlocked || error instanceof ClientStopped) {
      throw error
    }
    throw new DetectionFailed(`Generation probe failed: ${formatError(error)}`, { cause: error })
  }

  const generation = classifyGeneration(raw)
  if (!generation) {
    throw new DetectionFailed('Parameter reply carries neither air-sensor markers nor the baseline mode field')
  }

  logger.info(`Detected ${generation === 'new' ? 'floor+air' : 'floor-only'} thermostat`)
  return generation
}

/**
 * Check that a later poll still describes the generation detected for this session
 */
export function assertGeneration(raw: RawTelegram, generation: DeviceGeneration): void {
  const observed = classifyGeneration(raw)
  if (observed !== null && observed !== generation) {
    throw new GenerationMismatch(`Session was detected as "${generation}" but the device now reports "${observed}"`)
  }
}
