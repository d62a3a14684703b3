import { vi, type Mock } from 'vitest'
import type { SubnamespaceSource } from '@review-app-cleanup/k8s-client'
import type { CommandRunner } from '@review-app-cleanup/shared/command-runner'
import { ExternalToolError } from '@review-app-cleanup/shared/errors'
import type { Logger } from '@review-app-cleanup/shared/logger'
import type { ReleaseRecord } from '../src/types.js'

export interface TestLogger extends Logger {
  info: Mock<(message: string) => void>
  debug: Mock<(message: string) => void>
  warning: Mock<(message: string) => void>
  error: Mock<(message: string) => void>
  groups: string[]
}

export function createTestLogger(): TestLogger {
  const groups: string[] = []

  return {
    isDebug: false,
    info: vi.fn<(message: string) => void>(),
    debug: vi.fn<(message: string) => void>(),
    warning: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
    groups,
    group: async <T>(name: string, fn: () => Promise<T>): Promise<T> => {
      groups.push(name)
      return fn()
    }
  }
}

export function release(updated: string): ReleaseRecord {
  return {
    name: 'app',
    namespace: 'review',
    revision: '3',
    updated,
    status: 'deployed',
    chart: 'app-1.0.0',
    app_version: '1.0.0'
  }
}

export interface FakeCommandRunner extends CommandRunner {
  run: Mock<(command: string, args: string[]) => Promise<unknown>>
}

/**
 * Answers `helm list --namespace <ns>` with the canned output for `<ns>`.
 * Error values are thrown; unknown namespaces fail like helm would.
 */
export function createFakeRunner(
  responses: Record<string, unknown>
): FakeCommandRunner {
  return {
    run: vi.fn<(command: string, args: string[]) => Promise<unknown>>(
      async (command, args) => {
        const namespace = args[args.indexOf('--namespace') + 1]
        const response = responses[namespace]

        if (response instanceof Error) {
          throw response
        }
        if (response === undefined) {
          throw new ExternalToolError(
            command,
            args,
            1,
            `Error: namespace "${namespace}" not found`
          )
        }
        return response
      }
    )
  }
}

export interface FakeSubnamespaceSource extends SubnamespaceSource {
  listSubnamespaceNames: Mock<(parentNamespace: string) => Promise<string[]>>
}

export function createFakeSource(names: string[]): FakeSubnamespaceSource {
  return {
    listSubnamespaceNames: vi.fn<(parentNamespace: string) => Promise<string[]>>(
      async () => [...names]
    )
  }
}
