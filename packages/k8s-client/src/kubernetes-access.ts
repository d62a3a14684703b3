import * as k8s from '@kubernetes/client-node'
import type { Logger } from '@review-app-cleanup/shared/logger'

export interface VerifyKubernetesAccessOptions {
  /**
   * Context to switch to. The kubeconfig's current context is used when unset.
   */
  kubernetesContext?: string
}

export async function verifyKubernetesAccess(
  logger: Logger,
  options: VerifyKubernetesAccessOptions = {}
): Promise<k8s.KubeConfig> {
  return logger.group('Verifying Kubernetes connectivity', async () => {
    const kc = new k8s.KubeConfig()
    kc.loadFromDefault()

    const { kubernetesContext } = options
    if (kubernetesContext) {
      const contexts = kc.getContexts()
      const contextExists = contexts.some(
        (ctx) => ctx.name === kubernetesContext
      )

      if (!contextExists) {
        logger.error(
          `Cannot find context '${kubernetesContext}' in kubeconfig. Available contexts:`
        )
        contexts.forEach((ctx) => logger.info(`  - ${ctx.name}`))
        throw new Error(`Context '${kubernetesContext}' does not exist`)
      }

      kc.setCurrentContext(kubernetesContext)
    }

    const contextName = kc.getCurrentContext()
    logger.info(`Using context: ${contextName}`)

    // Equivalent to kubectl auth whoami
    const authApi = kc.makeApiClient(k8s.AuthenticationV1Api)
    try {
      const whoami = await authApi.createSelfSubjectReview({
        body: {
          apiVersion: 'authentication.k8s.io/v1',
          kind: 'SelfSubjectReview'
        }
      })
      const username =
        whoami.status?.userInfo?.username || 'authenticated user'
      logger.info(`✅ Successfully authenticated as: ${username}`)
    } catch (error) {
      throw new Error(
        `Cannot connect to the cluster using context '${contextName}': ${error}`
      )
    }

    return kc
  })
}
