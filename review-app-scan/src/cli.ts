/**
 * Command-line interface for running the scan outside of an Actions step.
 *
 * Examples:
 *   $ review-app-scan my-app review-apps
 *   $ review-app-scan my-app review-apps --max-age 48 --debug
 */

import { Command, InvalidArgumentError } from 'commander'
import {
  SubnamespaceClient,
  verifyKubernetesAccess
} from '@review-app-cleanup/k8s-client'
import { ExecCommandRunner } from '@review-app-cleanup/shared/command-runner'
import {
  ScanError,
  getErrorMessage
} from '@review-app-cleanup/shared/errors'
import { createLogger } from '@review-app-cleanup/shared/logger'
import { hoursToMs } from '@review-app-cleanup/shared/time-utils'
import { runScan } from './scan'
import { generateSummary } from './summary'
import type { ScanInputs } from './types'

const VERSION = '0.1.0'

export const DEFAULT_MAX_AGE_HOURS = 72

export interface CliOptions {
  maxAge: number
  debug: boolean
  context?: string
  output?: string
}

export type CliAction = (
  reviewAppName: string,
  namespace: string,
  options: CliOptions
) => Promise<void>

export function parseHours(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Must be a whole number of hours.')
  }
  return parseInt(value, 10)
}

export async function runCli(
  reviewAppName: string,
  namespace: string,
  options: CliOptions
): Promise<void> {
  const logger = createLogger({ debug: options.debug })
  logger.debug(
    `Arguments: ${JSON.stringify({ reviewAppName, namespace, ...options })}`
  )

  const inputs: ScanInputs = {
    reviewAppName,
    namespace,
    maxAgeMs: hoursToMs(options.maxAge)
  }

  try {
    const kc = await verifyKubernetesAccess(logger, {
      kubernetesContext: options.context
    })
    const result = await runScan(inputs, {
      subnamespaces: new SubnamespaceClient(kc),
      runner: new ExecCommandRunner(),
      logger,
      outputPath: options.output
    })
    await generateSummary(inputs, result)
  } catch (error) {
    const stage = error instanceof ScanError ? error.stage : 'setup'
    logger.error(`Scan failed during ${stage}: ${getErrorMessage(error)}`)
    process.exitCode = 1
  }
}

export function createProgram(action: CliAction = runCli): Command {
  const program = new Command()

  program
    .name('review-app-scan')
    .version(VERSION, '-v, --version', 'Display CLI version')
    .description(
      'Find review app namespaces whose Helm release has not been updated within the max age'
    )
    .argument('<review_app_name>', 'Application name in review-<PR>-<app>')
    .argument('<namespace>', 'Parent namespace holding the sub-namespaces')
    .option(
      '--max-age <hours>',
      'Max time since a review app was updated in hours',
      parseHours,
      DEFAULT_MAX_AGE_HOURS
    )
    .option('-d, --debug', 'Print debug info', false)
    .option('--context <name>', 'Kubernetes context to use')
    .option(
      '--output <file>',
      'File to append the matrix line to (defaults to $GITHUB_OUTPUT)'
    )
    .action(
      async (reviewAppName: string, namespace: string, options: CliOptions) => {
        await action(reviewAppName, namespace, options)
      }
    )

  return program
}
