import * as core from '@actions/core'

export interface Logger {
  readonly isDebug: boolean
  info(message: string): void
  debug(message: string): void
  warning(message: string): void
  error(message: string): void
  group<T>(name: string, fn: () => Promise<T>): Promise<T>
}

export interface LoggerOptions {
  debug?: boolean
}

/**
 * Creates a logger backed by the Actions toolkit.
 *
 * With `debug` enabled, debug messages are printed as regular log lines so they
 * show up without `ACTIONS_STEP_DEBUG` being set on the workflow. Without it,
 * they are only emitted as `::debug::` commands inside an Actions runner.
 *
 * Outside a runner, warnings and errors go to stderr and groups become a plain
 * heading line instead of workflow commands.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const isDebug = options.debug ?? false
  const inActions = process.env.GITHUB_ACTIONS === 'true'

  return {
    isDebug,
    info: (message) => core.info(message),
    debug: (message) => {
      if (isDebug) {
        core.info(message)
      } else if (inActions) {
        core.debug(message)
      }
    },
    warning: (message) => {
      if (inActions) {
        core.warning(message)
      } else {
        console.error(`Warning: ${message}`)
      }
    },
    error: (message) => {
      if (inActions) {
        core.error(message)
      } else {
        console.error(message)
      }
    },
    group: async (name, fn) => {
      if (inActions) {
        return core.group(name, fn)
      }
      core.info(name)
      return fn()
    }
  }
}
