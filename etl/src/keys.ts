import fs from 'node:fs'
import path from 'node:path'
import { z } from 'zod'

/**
 * Append-only surrogate key registry.
 *
 * A value keeps the key it was first given for as long as the registry file is
 * carried from release to release. New values are sorted and appended after the
 * current maximum, so adding a value never renumbers existing ones. Without a
 * prior snapshot the keys come out in plain alphabetical order.
 */

const snapshotSchema = z.record(z.record(z.number().int().positive()))

export type KeySnapshot = z.infer<typeof snapshotSchema>

export const byCodeUnit = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

export class KeyRegistry {
  private tables = new Map<string, Map<string, number>>()

  constructor(snapshot: KeySnapshot = {}) {
    for (const [table, keys] of Object.entries(snapshot)) {
      this.tables.set(table, new Map(Object.entries(keys)))
    }
  }

  assign(table: string, values: Iterable<string>): Map<string, number> {
    const keys = this.tables.get(table) ?? new Map<string, number>()
    this.tables.set(table, keys)

    const distinct = Array.from(new Set(values))
    let next = Math.max(0, ...keys.values()) + 1
    for (const value of distinct.filter(v => !keys.has(v)).sort(byCodeUnit)) {
      keys.set(value, next++)
    }

    const out = new Map<string, number>()
    for (const value of distinct.sort(byCodeUnit)) {
      const key = keys.get(value)
      if (key !== undefined) out.set(value, key)
    }
    return out
  }

  snapshot(): KeySnapshot {
    const out: KeySnapshot = {}
    for (const table of Array.from(this.tables.keys()).sort(byCodeUnit)) {
      const keys = this.tables.get(table) ?? new Map<string, number>()
      out[table] = Object.fromEntries(Array.from(keys.entries()).sort((a, b) => a[1] - b[1]))
    }
    return out
  }
}

export function loadKeyRegistry(file: string): KeyRegistry {
  if (!fs.existsSync(file)) return new KeyRegistry()
  const parsed = snapshotSchema.parse(JSON.parse(fs.readFileSync(file, 'utf8')))
  return new KeyRegistry(parsed)
}

export function saveKeyRegistry(file: string, registry: KeyRegistry): void {
  fs.mkdirSync(path.dirname(file), { recursive: true })
  fs.writeFileSync(file, JSON.stringify(registry.snapshot(), null, 2) + '\n', 'utf8')
}

export interface KeyChange {
  table: string
  value: string
  before?: number
  after: number
}

/** Keys added between two snapshots, and keys whose number changed. */
export function diffKeySnapshots(before: KeySnapshot, after: KeySnapshot): { added: KeyChange[]; shifted: KeyChange[] } {
  const added: KeyChange[] = []
  const shifted: KeyChange[] = []
  for (const table of Object.keys(after).sort(byCodeUnit)) {
    const old = before[table] ?? {}
    for (const [value, key] of Object.entries(after[table] ?? {})) {
      const previous = old[value]
      if (previous === undefined) added.push({ table, value, after: key })
      else if (previous !== key) shifted.push({ table, value, before: previous, after: key })
    }
  }
  return { added, shifted }
}
