/**
 * API group of the Hierarchical Namespace Controller
 */
export const HNC_GROUP = 'hnc.x-k8s.io'

export const HNC_VERSION = 'v1alpha2'

/**
 * Plural of the SubnamespaceAnchor custom resource
 */
export const SUBNAMESPACE_ANCHOR_PLURAL = 'subnamespaceanchors'
