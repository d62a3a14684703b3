import type { Logger } from '@review-app-cleanup/shared/logger'

/**
 * Escapes characters with a special meaning in regular expressions
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Matches `review-<PR number>-<app name>` at the start of a namespace name.
 * Trailing characters are allowed, so `review-1-foobar` matches app `foo`.
 */
export function buildReviewAppPattern(reviewAppName: string): RegExp {
  return new RegExp(`^review-\\d+-${escapeRegExp(reviewAppName)}`)
}

export function filterReviewAppNamespaces(
  namespaces: string[],
  reviewAppName: string,
  logger: Logger
): string[] {
  logger.info(`Finding ${reviewAppName} review app namespaces...`)

  const pattern = buildReviewAppPattern(reviewAppName)
  logger.debug(`Pattern: ${pattern.source}`)

  const matches = namespaces.filter((namespace) => {
    const matched = pattern.test(namespace)
    logger.debug(`  ${matched ? 'Matched' : 'Ignored'}: ${namespace}`)
    return matched
  })

  logger.info(`Found ${matches.length} review app namespace(s)`)
  return matches
}
