import * as fs from 'fs'

/**
 * File written when `GITHUB_OUTPUT` is not set, e.g. on a local run
 */
export const DEFAULT_OUTPUT_FILE = 'GITHUB_OUTPUT'

/**
 * `review-42-foo` -> `42`. Taken verbatim, no numeric validation.
 */
export function getPrNumber(namespace: string): string {
  return namespace.split('-')[1] ?? ''
}

export function formatMatrixOutput(namespaces: string[]): string {
  const prNumbers = namespaces.map(getPrNumber)
  return `matrix=${JSON.stringify({ pr_numbers: prNumbers })}`
}

export function resolveOutputPath(outputPath?: string): string {
  return outputPath || process.env.GITHUB_OUTPUT || DEFAULT_OUTPUT_FILE
}

/**
 * Appends the `matrix=` line for `namespaces` to the output file and returns
 * the line that was written.
 */
export function writeMatrixOutput(
  namespaces: string[],
  outputPath?: string
): string {
  const line = formatMatrixOutput(namespaces)
  fs.appendFileSync(resolveOutputPath(outputPath), `${line}\n`, {
    encoding: 'utf8'
  })
  return line
}
