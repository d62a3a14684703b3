/**
 * One entry of `helm list -o json`
 */
export interface ReleaseRecord {
  name?: string
  namespace?: string
  revision?: string
  updated: string
  status?: string
  chart?: string
  app_version?: string
}

export interface NamespaceEvaluation {
  namespace: string
  release: ReleaseRecord
  lastUpdated: Date
  ageMs: number
  stale: boolean
}

export interface SkippedNamespace {
  namespace: string
  reason: string
}

export interface EvaluationResult {
  evaluations: NamespaceEvaluation[]
  skipped: SkippedNamespace[]
  staleNamespaces: string[]
}

export interface ScanInputs {
  reviewAppName: string
  namespace: string
  maxAgeMs: number
}

export interface ScanResult extends EvaluationResult {
  discovered: string[]
  reviewApps: string[]
  prNumbers: string[]
  outputLine: string
}

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }
