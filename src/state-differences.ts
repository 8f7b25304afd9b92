export type StateDifference = { from: unknown; to: unknown }

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * Flattened per-field differences between two published states.
 * Nested objects are compared key by key and reported with dotted paths;
 * ignoring a key also ignores everything below it.
 */
export function getStateDifferences(
  oldState: object | null,
  newState: object,
  ignoredKeys: readonly string[] = [],
): Record<string, StateDifference> {
  const differences: Record<string, StateDifference> = {}

  if (!oldState) {
    return differences
  }

  // Exact match, or any parent ("diagnostics" ignores "diagnostics.sensorFault")
  const shouldIgnore = (path: string): boolean => {
    if (ignoredKeys.includes(path)) {
      return true
    }
    const parts = path.split('.')
    for (let i = 1; i < parts.length; i++) {
      if (ignoredKeys.includes(parts.slice(0, i).join('.'))) {
        return true
      }
    }
    return false
  }

  const compareValues = (oldVal: unknown, newVal: unknown, path: string): void => {
    const normalizedOld = oldVal ?? null
    const normalizedNew = newVal ?? null

    if (JSON.stringify(normalizedOld) === JSON.stringify(normalizedNew)) {
      return
    }

    if (isRecord(normalizedOld) && isRecord(normalizedNew)) {
      const allKeys = new Set([...Object.keys(normalizedOld), ...Object.keys(normalizedNew)])
      for (const key of allKeys) {
        const fullPath = `${path}.${key}`
        if (shouldIgnore(fullPath)) continue
        compareValues(normalizedOld[key], normalizedNew[key], fullPath)
      }
      return
    }

    differences[path] = { from: oldVal, to: newVal }
  }

  const previous = new Map(Object.entries(oldState))
  for (const [key, value] of Object.entries(newState)) {
    if (shouldIgnore(key)) continue
    compareValues(previous.get(key), value, key)
  }

  return differences
}

export function formatStateDifferences(differences: Record<string, StateDifference>): string {
  return Object.entries(differences)
    .map(([key, { from, to }]) => `\n  ${key}: ${from} → ${to}`)
    .join('')
}
