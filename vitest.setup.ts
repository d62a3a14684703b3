import { afterEach, beforeEach, vi } from 'vitest'

// Keep tests from writing to the runner's own output and summary files when
// the suite itself runs inside a workflow.
beforeEach(() => {
  vi.stubEnv('GITHUB_OUTPUT', '')
  vi.stubEnv('GITHUB_STEP_SUMMARY', '')
  vi.stubEnv('GITHUB_ACTIONS', '')
})

afterEach(() => {
  vi.unstubAllEnvs()
})
