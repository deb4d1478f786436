import { describe, it, expect } from 'vitest'
import { LoadError } from '../src/errors.js'
import { LoadBatch } from '../src/tables/batch.js'
import { loadBatch, loadWithRetry } from '../src/load/loader.js'
import { isTransientError, withRetry } from '../src/load/retry.js'
import { SqliteDestination } from '../src/load/sqlite-destination.js'
import { verifyLoad } from '../src/load/verify.js'

const ORGANIZATION_TYPES = [
  { organization_type_id: 1, organization_type: 'federal' },
  { organization_type_id: 2, organization_type: 'university' },
]

function vocabularyBatch(organizationTypeId = 2): LoadBatch {
  const batch = new LoadBatch()
  batch.add('organization', [
    { organization_id: 1, organization: 'Example Conservation Lab', organization_type_id: 2 },
    { organization_id: 2, organization: 'Example Land Agency', organization_type_id: organizationTypeId },
  ])
  batch.add('organization_type', ORGANIZATION_TYPES)
  batch.add('personnel', [{ personnel_id: 1, personnel: 'Field Lead' }, { personnel_id: 2, personnel: 'Field Tech' }])
  return batch
}

const connectionRefused = () => Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' })

class RefusingDestination extends SqliteDestination {
  async open(): Promise<void> {
    throw connectionRefused()
  }
}

describe('loadBatch', () => {
  it('writes every table in load order and commits', async () => {
    const dest = new SqliteDestination(':memory:')
    await dest.open()
    const loaded: string[] = []
    const summary = await loadBatch(dest, vocabularyBatch(), { chunkSize: 1, onTable: table => loaded.push(table) })

    expect(summary).toEqual({
      destination: 'sqlite (in memory)',
      tables: { organization_type: 2, personnel: 2, organization: 2 },
      rows: 6,
    })
    expect(loaded).toEqual(['organization_type', 'personnel', 'organization'])
    expect(dest.select('organization')).toEqual([
      { organization_id: 1, organization: 'Example Conservation Lab', organization_type_id: 2 },
      { organization_id: 2, organization: 'Example Land Agency', organization_type_id: 2 },
    ])
    await dest.close()
  })

  it('rolls back everything and names the rejected record', async () => {
    const dest = new SqliteDestination(':memory:')
    await dest.open()

    const failure = await loadBatch(dest, vocabularyBatch(9)).then(() => undefined, (error: unknown) => error)
    expect(failure).toBeInstanceOf(LoadError)
    if (!(failure instanceof LoadError)) return
    expect(failure.location).toEqual({
      table: 'organization',
      record: { organization_id: 2, organization: 'Example Land Agency', organization_type_id: 9 },
    })
    expect(failure.message).toContain('FOREIGN KEY constraint failed')

    expect(await dest.count('organization_type')).toBe(0)
    expect(await dest.count('personnel')).toBe(0)
    expect(await dest.count('organization')).toBe(0)
    await dest.close()
  })

  it('leaves earlier loads in place when a later one fails', async () => {
    const dest = new SqliteDestination(':memory:')
    await dest.open()
    const first = new LoadBatch()
    first.add('organization_type', ORGANIZATION_TYPES)
    await loadBatch(dest, first)

    // The same keys again violate the primary key
    await expect(loadBatch(dest, vocabularyBatch())).rejects.toBeInstanceOf(LoadError)
    expect(await dest.count('organization_type')).toBe(2)
    expect(await dest.count('personnel')).toBe(0)
    await dest.close()
  })
})

describe('verifyLoad', () => {
  it('compares destination counts with the batch', async () => {
    const dest = new SqliteDestination(':memory:')
    await dest.open()
    const batch = vocabularyBatch()
    await loadBatch(dest, batch)

    const result = await verifyLoad(dest, batch)
    expect(result.problems).toEqual([])
    expect(result.counts.personnel).toEqual({ expected: 2, actual: 2 })

    batch.add('personnel', [{ personnel_id: 3, personnel: 'none' }])
    expect((await verifyLoad(dest, batch)).problems).toEqual(['personnel: expected 3 rows, found 2'])
    await dest.close()
  })
})

describe('retries', () => {
  it('retries transient connection failures with a fresh destination', async () => {
    let attempts = 0
    const waits: number[] = []
    const summary = await loadWithRetry(() => {
      attempts++
      return attempts === 1 ? new RefusingDestination(':memory:') : new SqliteDestination(':memory:')
    }, vocabularyBatch(), { retries: 2, retryDelayMs: 1, onRetry: (_error, _attempt, waitMs) => waits.push(waitMs) })

    expect(attempts).toBe(2)
    expect(waits).toEqual([1])
    expect(summary.rows).toBe(6)
  })

  it('does not retry data errors', async () => {
    let attempts = 0
    await expect(loadWithRetry(() => {
      attempts++
      return new SqliteDestination(':memory:')
    }, vocabularyBatch(9), { retries: 3, retryDelayMs: 1 })).rejects.toBeInstanceOf(LoadError)
    expect(attempts).toBe(1)
  })

  it('backs off exponentially and gives up after the last retry', async () => {
    const waits: number[] = []
    let calls = 0
    await expect(withRetry(async () => {
      calls++
      throw connectionRefused()
    }, { retries: 2, delayMs: 1, onRetry: (_error, _attempt, waitMs) => waits.push(waitMs) })).rejects.toThrow('ECONNREFUSED')
    expect(calls).toBe(3)
    expect(waits).toEqual([1, 2])
  })

  it('recognizes transient codes anywhere in the cause chain', () => {
    const busy = Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' })
    expect(isTransientError(busy)).toBe(true)
    expect(isTransientError(new LoadError('site', busy))).toBe(true)
    expect(isTransientError(new LoadError('transaction', new AggregateError([new Error('syntax error'), busy])))).toBe(true)
    expect(isTransientError(new AggregateError([new Error('syntax error')]))).toBe(false)
    expect(isTransientError(new Error('FOREIGN KEY constraint failed'))).toBe(false)
    expect(isTransientError('ECONNRESET')).toBe(false)
  })
})
