import * as exec from '@actions/exec'
import { ExternalToolError, ParseError, getErrorMessage } from './errors'

/**
 * Runs an external command and returns its stdout parsed as JSON
 */
export interface CommandRunner {
  run(command: string, args: string[]): Promise<unknown>
}

export class ExecCommandRunner implements CommandRunner {
  async run(command: string, args: string[]): Promise<unknown> {
    let output: exec.ExecOutput

    try {
      output = await exec.getExecOutput(command, args, {
        silent: true,
        ignoreReturnCode: true
      })
    } catch (error) {
      // getExecOutput rejects when the binary cannot be started
      throw new ExternalToolError(
        command,
        args,
        null,
        '',
        `Failed to run '${command}': ${getErrorMessage(error)}`
      )
    }

    if (output.exitCode !== 0) {
      throw new ExternalToolError(
        command,
        args,
        output.exitCode,
        output.stderr.trim()
      )
    }

    return parseJsonOutput(`${command} ${args.join(' ')}`, output.stdout)
  }
}

export function parseJsonOutput(source: string, stdout: string): unknown {
  try {
    return JSON.parse(stdout)
  } catch (error) {
    throw new ParseError(source, getErrorMessage(error))
  }
}
