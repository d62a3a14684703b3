export { verifyKubernetesAccess } from './kubernetes-access.js'
export type { VerifyKubernetesAccessOptions } from './kubernetes-access.js'
export { SubnamespaceClient, extractNames } from './subnamespace-client.js'
export * from './constants.js'
export type { SubnamespaceSource } from './types.js'
