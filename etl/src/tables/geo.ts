import type { Row } from '@vegplot/shared'
import { BoundsError } from '../errors.js'

// Plot region; longitudes past 172 are west of the dateline
export const LATITUDE_RANGE = { min: 50.4, max: 71.6 } as const
export const LONGITUDE_RANGE = { min: -179.99, max: -130, dateline: 172 } as const

export function isWithinPlotRegion(latitude: number, longitude: number): boolean {
  const latOk = latitude >= LATITUDE_RANGE.min && latitude <= LATITUDE_RANGE.max
  const lonOk = (longitude >= LONGITUDE_RANGE.min && longitude <= LONGITUDE_RANGE.max) || longitude > LONGITUDE_RANGE.dateline
  return latOk && lonOk
}

/** Rejects the whole batch on the first site outside the plot region. */
export function checkSiteBounds(sites: readonly Row[]): void {
  for (const site of sites) {
    const { site_code, latitude_dd, longitude_dd } = site
    if (typeof latitude_dd !== 'number' || typeof longitude_dd !== 'number') {
      throw new BoundsError(String(site_code), Number(latitude_dd), Number(longitude_dd))
    }
    if (!isWithinPlotRegion(latitude_dd, longitude_dd)) {
      throw new BoundsError(String(site_code), latitude_dd, longitude_dd)
    }
  }
}
