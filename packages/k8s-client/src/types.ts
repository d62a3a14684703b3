/**
 * Source of sub-namespace names under a parent namespace
 */
export interface SubnamespaceSource {
  listSubnamespaceNames(parentNamespace: string): Promise<string[]>
}
