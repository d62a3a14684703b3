import type { CommandRunner } from '@review-app-cleanup/shared/command-runner'
import { getErrorMessage } from '@review-app-cleanup/shared/errors'
import type { Logger } from '@review-app-cleanup/shared/logger'
import {
  calculateAgeMs,
  formatAge
} from '@review-app-cleanup/shared/time-utils'
import { getLastUpdated, getRelease } from './release-lookup'
import type { EvaluationResult, ReleaseRecord, Result } from './types'

export interface EvaluateOptions {
  runner: CommandRunner
  logger: Logger
  /**
   * Reference instant for every age computation in the run
   */
  now: Date
  maxAgeMs: number
}

interface LookupValue {
  release: ReleaseRecord
  lastUpdated: Date
}

async function lookupRelease(
  namespace: string,
  options: EvaluateOptions
): Promise<Result<LookupValue>> {
  try {
    const release = await getRelease(options.runner, namespace, options.logger)
    return { ok: true, value: { release, lastUpdated: getLastUpdated(release) } }
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error : new Error(String(error))
    }
  }
}

/**
 * Looks up the release age of each namespace, one at a time.
 *
 * A namespace whose lookup fails is logged, recorded as skipped and left out
 * of the stale list; the remaining namespaces are still evaluated.
 */
export async function evaluateNamespaces(
  namespaces: string[],
  options: EvaluateOptions
): Promise<EvaluationResult> {
  const { logger, now, maxAgeMs } = options
  const result: EvaluationResult = {
    evaluations: [],
    skipped: [],
    staleNamespaces: []
  }

  for (const [index, namespace] of namespaces.entries()) {
    logger.debug(`[${index + 1}/${namespaces.length}] ${namespace}`)

    const lookup = await lookupRelease(namespace, options)
    if (!lookup.ok) {
      const reason = getErrorMessage(lookup.error)
      logger.error(`Error getting release for ${namespace}: ${reason}`)
      result.skipped.push({ namespace, reason })
      continue
    }

    const { release, lastUpdated } = lookup.value
    const ageMs = calculateAgeMs(lastUpdated, now)
    const stale = ageMs > maxAgeMs

    if (stale) {
      logger.debug(
        `Namespace ${namespace} not updated for ${formatAge(Math.floor(ageMs / 1000))}. Adding to delete list.`
      )
      result.staleNamespaces.push(namespace)
    }

    result.evaluations.push({ namespace, release, lastUpdated, ageMs, stale })
  }

  return result
}
