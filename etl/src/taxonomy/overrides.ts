import fs from 'node:fs'
import { z } from 'zod'
import { readCsv, type CsvRecord } from '../csv.js'
import { SourceError } from '../errors.js'
import { cleanText } from './source.js'

// Dataset value that applies an override to every dataset
export const ANY_DATASET = '*'

const overrideRowSchema = z
  .object({
    dataset: z.string().transform(cleanText).pipe(z.string().min(1)),
    name_original: z.string().transform(cleanText).pipe(z.string().min(1)),
    name_corrected: z.string().optional().transform(v => (v === undefined ? '' : cleanText(v))),
    action: z.string().optional().transform(v => cleanText(v ?? '').toLowerCase() || 'correct').pipe(z.enum(['correct', 'exclude'])),
  })
  .refine(r => r.action === 'exclude' || (r.name_corrected !== '' && r.name_corrected !== 'NA'), {
    message: 'a correction needs name_corrected',
    path: ['name_corrected'],
  })

export type Override =
  | { action: 'correct'; dataset: string; nameOriginal: string; nameCorrected: string }
  | { action: 'exclude'; dataset: string; nameOriginal: string }

/**
 * Name corrections and exclusions keyed by (dataset, raw name). A dataset-specific
 * entry wins over a wildcard entry for the same raw name.
 */
export class OverrideTable {
  private readonly entries = new Map<string, Override>()

  constructor(overrides: Iterable<Override> = []) {
    for (const o of overrides) {
      const key = OverrideTable.key(o.dataset, o.nameOriginal)
      if (this.entries.has(key)) {
        throw new SourceError(`Duplicate override for "${o.nameOriginal}" in dataset ${o.dataset}`)
      }
      this.entries.set(key, Object.freeze(o))
    }
  }

  private static key(dataset: string, name: string): string {
    return `${dataset}\u0000${name}`
  }

  get size(): number {
    return this.entries.size
  }

  find(dataset: string, nameOriginal: string): Override | undefined {
    return this.entries.get(OverrideTable.key(dataset, nameOriginal))
      ?? this.entries.get(OverrideTable.key(ANY_DATASET, nameOriginal))
  }
}

export function parseOverrides(records: CsvRecord[], file = '<overrides>'): OverrideTable {
  const overrides = records.map((record, i): Override => {
    const result = overrideRowSchema.safeParse(record)
    if (!result.success) {
      const issue = result.error.issues[0]
      throw new SourceError(`Invalid override ${issue?.path.join('.') ?? 'row'}: ${issue?.message ?? 'unknown issue'}`, { file, line: i + 2 })
    }
    const r = result.data
    return r.action === 'exclude'
      ? { action: 'exclude', dataset: r.dataset, nameOriginal: r.name_original }
      : { action: 'correct', dataset: r.dataset, nameOriginal: r.name_original, nameCorrected: r.name_corrected }
  })
  return new OverrideTable(overrides)
}

// A missing overrides file means no overrides
export function readOverrides(file: string): OverrideTable {
  if (!fs.existsSync(file)) return new OverrideTable()
  return parseOverrides(readCsv(file), file)
}
