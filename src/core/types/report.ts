import { Result } from './check'

// Site name -> result
export type CategoryResult = ReadonlyMap<string, Result>

export interface Report {
  readonly timestamp: string
  readonly categories: ReadonlyMap<string, CategoryResult>
}

export interface RunStats {
  total: number
  up: number
  down: number
  unknown: number
  error: number
}
