import type { CommandRunner } from '@review-app-cleanup/shared/command-runner'
import { ScanError } from '@review-app-cleanup/shared/errors'
import type { Logger } from '@review-app-cleanup/shared/logger'
import { formatAge } from '@review-app-cleanup/shared/time-utils'
import type { SubnamespaceSource } from '@review-app-cleanup/k8s-client'
import { evaluateNamespaces } from './evaluate'
import { filterReviewAppNamespaces } from './filter'
import { getPrNumber, writeMatrixOutput } from './output'
import type { ScanInputs, ScanResult } from './types'

export interface ScanDependencies {
  subnamespaces: SubnamespaceSource
  runner: CommandRunner
  logger: Logger
  now?: Date
  outputPath?: string
}

/**
 * Discovers review app namespaces under `inputs.namespace`, selects the ones
 * whose release is older than `inputs.maxAgeMs` and appends their PR numbers
 * to the output file.
 */
export async function runScan(
  inputs: ScanInputs,
  deps: ScanDependencies
): Promise<ScanResult> {
  const { logger } = deps
  const now = deps.now ?? new Date()

  logger.info(`Getting sub-namespaces of ${inputs.namespace}...`)
  let discovered: string[]
  try {
    discovered = await deps.subnamespaces.listSubnamespaceNames(
      inputs.namespace
    )
  } catch (error) {
    throw new ScanError('discovery', error)
  }
  logger.debug(`Sub-namespaces: ${JSON.stringify(discovered)}`)
  logger.info(`Found ${discovered.length} sub-namespace(s)`)

  const reviewApps = filterReviewAppNamespaces(
    discovered,
    inputs.reviewAppName,
    logger
  )

  const maxAge = formatAge(Math.floor(inputs.maxAgeMs / 1000))
  const evaluation = await logger.group(
    `Searching for review apps not updated for at least ${maxAge}`,
    () =>
      evaluateNamespaces(reviewApps, {
        runner: deps.runner,
        logger,
        now,
        maxAgeMs: inputs.maxAgeMs
      })
  )

  const { staleNamespaces } = evaluation
  logger.info(
    `Found ${staleNamespaces.length} review app(s) to be deleted${staleNamespaces.length > 0 ? `: ${staleNamespaces.join(', ')}` : ''}`
  )

  logger.debug('Writing matrix output...')
  let outputLine: string
  try {
    outputLine = writeMatrixOutput(staleNamespaces, deps.outputPath)
  } catch (error) {
    throw new ScanError('output', error)
  }
  logger.debug(outputLine)

  return {
    discovered,
    reviewApps,
    ...evaluation,
    prNumbers: staleNamespaces.map(getPrNumber),
    outputLine
  }
}
