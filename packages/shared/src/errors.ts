/**
 * An external command or API call failed (non-zero exit status, spawn
 * failure or a rejected Kubernetes API request).
 */
export class ExternalToolError extends Error {
  readonly command: string
  readonly args: string[]
  readonly exitCode: number | null
  readonly stderr: string

  constructor(
    command: string,
    args: string[],
    exitCode: number | null,
    stderr: string,
    message?: string
  ) {
    const detail = stderr ? `: ${stderr}` : ''
    super(
      message ??
        `Command '${[command, ...args].join(' ')}' failed with exit code ${exitCode ?? 'unknown'}${detail}`
    )
    this.name = 'ExternalToolError'
    this.command = command
    this.args = args
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

/**
 * Output of an external command could not be parsed as the expected data.
 */
export class ParseError extends Error {
  readonly source: string

  constructor(source: string, message: string) {
    super(`Failed to parse output of ${source}: ${message}`)
    this.name = 'ParseError'
    this.source = source
  }
}

/**
 * The release listing for a namespace did not contain exactly one release.
 */
export class ReleaseCountError extends Error {
  readonly namespace: string
  readonly count: number

  constructor(namespace: string, count: number) {
    super(`Expected 1 release in namespace '${namespace}', found ${count}`)
    this.name = 'ReleaseCountError'
    this.namespace = namespace
    this.count = count
  }
}

export class TimestampParseError extends Error {
  readonly value: string

  constructor(value: string) {
    super(
      `Invalid timestamp '${value}'. Expected an ISO-8601 date-time with a timezone offset`
    )
    this.name = 'TimestampParseError'
    this.value = value
  }
}

export type ScanStage = 'discovery' | 'output'

/**
 * A fatal failure, tagged with the pipeline stage it came from
 */
export class ScanError extends Error {
  readonly stage: ScanStage

  constructor(stage: ScanStage, cause: unknown) {
    super(`${stage} failed: ${getErrorMessage(cause)}`, { cause })
    this.name = 'ScanError'
    this.stage = stage
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
