/**
 * Home Assistant MQTT Climate Device Types
 * Based on: https://www.home-assistant.io/integrations/climate.mqtt/
 */

export type HAClimateMode = 'auto' | 'cool' | 'heat' | 'off'
export type HAClimateAction = 'off' | 'heating' | 'cooling' | 'idle'

export interface HAClimateDiscoveryConfig {
  name: string
  object_id: string
  uniq_id: string
  device: {
    identifiers: string[]
    manufacturer: string
    model: string
    name: string
  }
  availability_topic: string
  availability_template: string
  payload_available: string
  payload_not_available: string
  json_attributes_topic: string
  modes: HAClimateMode[]
  mode_state_topic: string
  mode_state_template: string
  mode_command_topic: string
  mode_command_template: string
  preset_modes: string[]
  preset_mode_state_topic: string
  preset_mode_value_template: string
  preset_mode_command_topic: string
  preset_mode_command_template: string
  action_topic: string
  action_template: string
  precision: number
  temp_step: number
  temperature_unit: 'C' | 'F'
  initial: number
  min_temp: number
  max_temp: number
  current_temperature_topic: string
  current_temperature_template: string
  temperature_state_topic: string
  temperature_state_template: string
  temperature_command_topic: string
  temperature_command_template: string
}
