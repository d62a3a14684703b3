import * as core from '@actions/core'
import { formatAge } from '@review-app-cleanup/shared/time-utils'
import { getPrNumber } from './output'
import type { ScanInputs, ScanResult } from './types'

export async function generateSummary(
  inputs: ScanInputs,
  result: ScanResult
): Promise<void> {
  if (!process.env.GITHUB_STEP_SUMMARY) {
    core.debug('GITHUB_STEP_SUMMARY not set, skipping job summary')
    return
  }

  const summary = core.summary
  const staleEvaluations = result.evaluations.filter((e) => e.stale)

  if (staleEvaluations.length > 0) {
    summary.addHeading('🗑️ Stale review apps found', 2)
  } else {
    summary.addHeading('✅ No stale review apps', 2)
  }

  summary.addHeading('Scan summary', 3)
  summary.addTable([
    [
      { data: 'Metric', header: true },
      { data: 'Count', header: true }
    ],
    [
      { data: '**Sub-namespaces**' },
      { data: result.discovered.length.toString() }
    ],
    [
      { data: '**Review apps**' },
      { data: result.reviewApps.length.toString() }
    ],
    [{ data: '**Stale**' }, { data: staleEvaluations.length.toString() }],
    [{ data: '**Skipped**' }, { data: result.skipped.length.toString() }]
  ])

  if (staleEvaluations.length > 0) {
    summary.addHeading('Stale review apps', 3)
    summary.addTable([
      [
        { data: 'Namespace', header: true },
        { data: 'PR', header: true },
        { data: 'Age', header: true },
        { data: 'Last updated', header: true }
      ],
      ...staleEvaluations.map((e) => [
        { data: e.namespace },
        { data: `#${getPrNumber(e.namespace)}` },
        { data: formatAge(Math.floor(e.ageMs / 1000)) },
        { data: e.release.updated }
      ])
    ])
  }

  if (result.skipped.length > 0) {
    summary.addHeading('Skipped namespaces', 3)
    summary.addTable([
      [
        { data: 'Namespace', header: true },
        { data: 'Reason', header: true }
      ],
      ...result.skipped.map((s) => [{ data: s.namespace }, { data: s.reason }])
    ])
  }

  summary.addHeading('Scan details', 3)
  summary.addEOL()
  summary.addRaw(`- **Review App**: \`${inputs.reviewAppName}\`\n`)
  summary.addRaw(`- **Parent Namespace**: \`${inputs.namespace}\`\n`)
  summary.addRaw(
    `- **Max Age**: \`${formatAge(Math.floor(inputs.maxAgeMs / 1000))}\`\n`
  )

  await summary.write()
}
