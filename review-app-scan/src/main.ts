import * as core from '@actions/core'
import {
  SubnamespaceClient,
  verifyKubernetesAccess
} from '@review-app-cleanup/k8s-client'
import { ExecCommandRunner } from '@review-app-cleanup/shared/command-runner'
import { createLogger } from '@review-app-cleanup/shared/logger'
import { parseMaxAge } from '@review-app-cleanup/shared/time-utils'
import { runScan } from './scan'
import { generateSummary } from './summary'
import type { ScanInputs } from './types'

export interface ActionInputs extends ScanInputs {
  debug: boolean
  kubernetesContext: string
}

export function getActionInputs(): ActionInputs {
  const reviewAppName = core.getInput('review-app-name', { required: true })
  const namespace = core.getInput('namespace', { required: true })
  const maxAge = core.getInput('max-age') || '72'

  return {
    reviewAppName,
    namespace,
    maxAgeMs: parseMaxAge(maxAge),
    debug: core.getBooleanInput('debug'),
    kubernetesContext: core.getInput('kubernetes-context')
  }
}

export async function run(): Promise<void> {
  try {
    const inputs = getActionInputs()
    const logger = createLogger({ debug: inputs.debug })
    logger.debug(`Inputs: ${JSON.stringify(inputs)}`)

    const kc = await verifyKubernetesAccess(logger, {
      kubernetesContext: inputs.kubernetesContext || undefined
    })

    const result = await runScan(inputs, {
      subnamespaces: new SubnamespaceClient(kc),
      runner: new ExecCommandRunner(),
      logger
    })

    core.setOutput('stale-count', result.staleNamespaces.length)
    await generateSummary(inputs, result)
  } catch (error) {
    core.setFailed(`Action failed: ${error}`)
  }
}
