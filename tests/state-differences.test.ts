import { describe, expect, it } from 'vitest'
import { formatStateDifferences, getStateDifferences } from '../src/state-differences.js'

const climate = {
  serialNumber: 'TEST-0001',
  mode: 'heat',
  targetTemperature: 22,
  currentTemperature: 21,
  childLock: false,
  diagnostics: { loadPower: 1500, sensorType: '10k' },
}

describe('State Differences', () => {
  describe('getStateDifferences', () => {
    it('should detect changes in top-level properties', () => {
      const differences = getStateDifferences(climate, { ...climate, mode: 'cool', targetTemperature: 24 })

      expect(differences).toEqual({
        mode: { from: 'heat', to: 'cool' },
        targetTemperature: { from: 22, to: 24 },
      })
    })

    it('should report nested changes with dotted paths', () => {
      const differences = getStateDifferences(climate, {
        ...climate,
        diagnostics: { loadPower: 2000, sensorType: '10k' },
      })

      expect(differences).toEqual({ 'diagnostics.loadPower': { from: 1500, to: 2000 } })
    })

    it('should return empty object for null oldState', () => {
      expect(getStateDifferences(null, climate)).toEqual({})
    })

    it('should return empty object when nothing changed', () => {
      expect(getStateDifferences(climate, { ...climate })).toEqual({})
    })

    it('should treat undefined and null alike', () => {
      expect(getStateDifferences({ targetTemperature: null }, { targetTemperature: undefined })).toEqual({})
    })

    it('should report keys that appear', () => {
      expect(getStateDifferences({ mode: 'heat' }, { mode: 'heat', airTemperature: 21.5 })).toEqual({
        airTemperature: { from: undefined, to: 21.5 },
      })
    })

    it('should skip ignored keys', () => {
      const differences = getStateDifferences(
        climate,
        { ...climate, currentTemperature: 22, targetTemperature: 23 },
        ['currentTemperature'],
      )

      expect(differences).toEqual({ targetTemperature: { from: 22, to: 23 } })
    })

    it('should skip everything below an ignored parent', () => {
      const differences = getStateDifferences(
        climate,
        { ...climate, diagnostics: { loadPower: 2000, sensorType: '33k' } },
        ['diagnostics'],
      )

      expect(differences).toEqual({})
    })

    it('should skip single nested keys', () => {
      const differences = getStateDifferences(
        climate,
        { ...climate, diagnostics: { loadPower: 2000, sensorType: '33k' } },
        ['diagnostics.loadPower'],
      )

      expect(differences).toEqual({ 'diagnostics.sensorType': { from: '10k', to: '33k' } })
    })
  })

  describe('formatStateDifferences', () => {
    it('should render one indented line per change', () => {
      const output = formatStateDifferences({
        mode: { from: 'heat', to: 'off' },
        targetTemperature: { from: 22, to: null },
      })

      expect(output).toBe('\n  mode: heat → off\n  targetTemperature: 22 → null')
    })

    it('should render nothing without changes', () => {
      expect(formatStateDifferences({})).toBe('')
    })
  })
})
