import * as k8s from '@kubernetes/client-node'
import {
  ExternalToolError,
  ParseError,
  getErrorMessage
} from '@review-app-cleanup/shared/errors'
import {
  HNC_GROUP,
  HNC_VERSION,
  SUBNAMESPACE_ANCHOR_PLURAL
} from './constants.js'
import type { SubnamespaceSource } from './types.js'

const RESOURCE = `${SUBNAMESPACE_ANCHOR_PLURAL}.${HNC_GROUP}`

/**
 * Lists HNC sub-namespaces through their SubnamespaceAnchor objects
 */
export class SubnamespaceClient implements SubnamespaceSource {
  private readonly kubeConfig: k8s.KubeConfig
  private customApi?: k8s.CustomObjectsApi

  constructor(kubeConfig: k8s.KubeConfig) {
    this.kubeConfig = kubeConfig
  }

  private getCustomApi(): k8s.CustomObjectsApi {
    if (!this.customApi) {
      this.customApi = this.kubeConfig.makeApiClient(k8s.CustomObjectsApi)
    }
    return this.customApi
  }

  /**
   * Names of the sub-namespaces anchored in `parentNamespace`, in API order
   */
  async listSubnamespaceNames(parentNamespace: string): Promise<string[]> {
    if (!parentNamespace.trim()) {
      throw new Error('Parent namespace must not be empty')
    }

    let response: unknown
    try {
      response = await this.getCustomApi().listNamespacedCustomObject({
        group: HNC_GROUP,
        version: HNC_VERSION,
        namespace: parentNamespace,
        plural: SUBNAMESPACE_ANCHOR_PLURAL
      })
    } catch (error) {
      throw new ExternalToolError(
        'kubernetes-api',
        ['list', RESOURCE, '--namespace', parentNamespace],
        getStatusCode(error),
        '',
        `Failed to list ${RESOURCE} in namespace '${parentNamespace}': ${getErrorMessage(error)}`
      )
    }

    return extractNames(response)
  }
}

export function extractNames(response: unknown): string[] {
  if (!isRecord(response) || !Array.isArray(response.items)) {
    throw new ParseError(RESOURCE, "response has no 'items' list")
  }

  return response.items.map((item: unknown, index: number) => {
    const metadata = isRecord(item) ? item.metadata : undefined
    const name = isRecord(metadata) ? metadata.name : undefined

    if (typeof name !== 'string') {
      throw new ParseError(RESOURCE, `item ${index} has no metadata.name`)
    }
    return name
  })
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function getStatusCode(error: unknown): number | null {
  if (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'number'
  ) {
    return error.code
  }
  return null
}
