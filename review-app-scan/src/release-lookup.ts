import type { CommandRunner } from '@review-app-cleanup/shared/command-runner'
import { ParseError, ReleaseCountError } from '@review-app-cleanup/shared/errors'
import type { Logger } from '@review-app-cleanup/shared/logger'
import { parseTimestamp } from '@review-app-cleanup/shared/time-utils'
import type { ReleaseRecord } from './types'

/**
 * Go reference layout for RFC 3339 with numeric offset
 */
export const HELM_TIME_FORMAT = '2006-01-02T15:04:05Z07:00'

export function helmListArgs(namespace: string): string[] {
  return [
    'list',
    '--namespace',
    namespace,
    '-o',
    'json',
    '--time-format',
    HELM_TIME_FORMAT
  ]
}

/**
 * Returns the single Helm release installed in `namespace`.
 *
 * Zero or several releases are logged and raised as {@link ReleaseCountError};
 * callers treat that as a failure for this namespace only.
 */
export async function getRelease(
  runner: CommandRunner,
  namespace: string,
  logger: Logger
): Promise<ReleaseRecord> {
  logger.debug(`Getting helm releases for ${namespace}...`)

  const args = helmListArgs(namespace)
  const output = await runner.run('helm', args)
  logger.debug(`${namespace} releases: ${JSON.stringify(output)}`)

  const releases = parseReleaseList(`helm ${args.join(' ')}`, output)
  if (releases.length !== 1) {
    logger.warning(
      `Expected 1 release for ${namespace}, found ${releases.length}`
    )
    throw new ReleaseCountError(namespace, releases.length)
  }

  return releases[0]
}

export function parseReleaseList(
  source: string,
  output: unknown
): ReleaseRecord[] {
  if (!Array.isArray(output)) {
    throw new ParseError(source, 'expected a JSON array of releases')
  }

  return output.map((entry: unknown, index: number) => {
    if (!isReleaseRecord(entry)) {
      throw new ParseError(source, `release ${index} has no 'updated' field`)
    }
    return entry
  })
}

/**
 * Parses the `updated` field of a release
 */
export function getLastUpdated(release: ReleaseRecord): Date {
  return parseTimestamp(release.updated)
}

function isReleaseRecord(value: unknown): value is ReleaseRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'updated' in value &&
    typeof value.updated === 'string'
  )
}
