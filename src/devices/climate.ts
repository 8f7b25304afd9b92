import type { Preset } from '../commands.js'
import type { HealthStatus } from '../coordinator.js'
import { readBoolean, readEnum } from '../state.js'
import { isUnknownEnumValue } from '../telegram/codec.js'
import { schemaFor } from '../telegram/schema.js'
import type { ConnectionState } from '../types/climate.js'
import type { HAClimateAction, HAClimateMode } from '../types/homeassistant.js'
import type { DeviceState } from '../types/state.js'

/**
 * Helpers that turn a thermostat snapshot into Home Assistant climate terms
 */

/**
 * Off wins over everything, then the cooling toggle, then schedule mode
 * shows as auto
 */
export function toHvacMode(state: DeviceState): HAClimateMode {
  if (state.derived.powerOn === false) {
    return 'off'
  }
  if (readBoolean(state.parameters, 'coolingMode')) {
    return 'cool'
  }
  return readEnum(state.parameters, 'mode') === 'schedule' ? 'auto' : 'heat'
}

export function toHvacAction(state: DeviceState): HAClimateAction {
  if (state.derived.powerOn === false) {
    return 'off'
  }
  if (state.telemetry.relayActive !== true) {
    return 'idle'
  }
  return readBoolean(state.parameters, 'coolingMode') ? 'cooling' : 'heating'
}

export function toPreset(state: DeviceState): Preset | null {
  const mode = readEnum(state.parameters, 'mode')
  return mode === 'schedule' || mode === 'manual' ? mode : null
}

export function toConnectionState(health: HealthStatus): ConnectionState {
  return health.status === 'degraded' ? 'disconnected' : 'connected'
}

/**
 * Values of the parameters flagged as diagnostic for the snapshot's generation
 */
export function collectDiagnostics(state: DeviceState): Record<string, number | boolean | string | null> {
  if (!state.generation) {
    return {}
  }
  const diagnostics: Record<string, number | boolean | string | null> = {}
  for (const descriptor of schemaFor(state.generation).descriptors) {
    if (!descriptor.diagnostic) continue
    const value = state.parameters[descriptor.name] ?? null
    diagnostics[descriptor.name] = isUnknownEnumValue(value) ? value.toString() : value
  }
  return diagnostics
}
