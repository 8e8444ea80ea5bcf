import { DEFAULTS, type Config } from '../config'
import { execInherit, exitStatusOf, isCommandNotFound, isPermissionDenied } from '../utils/exec'
import { lineErr, lineInfo } from '../ui/renderer'

export type Delegate = (argv: readonly string[]) => Promise<number>

export interface DelegateOptions {
  exec?: typeof execInherit
  /** Where spawn diagnostics go; defaults to stderr. */
  report?: (line: string) => void
}

/**
 * Hands the argument vector to the real utility. Output is not captured and
 * the child's status comes back as-is.
 */
export function createDelegate(config: Config, options: DelegateOptions = {}): Delegate {
  const exec = options.exec ?? execInherit
  const report = options.report ?? ((line: string) => process.stderr.write(line + '\n'))
  const cmd = config.delegateCommand

  return async (argv) => {
    try {
      const res = await exec(cmd, [...argv])
      return exitStatusOf(res.code, res.signal)
    } catch (err: unknown) {
      // Same statuses a shell reports for a missing or non-executable command.
      if (isCommandNotFound(err)) {
        report(lineErr(`${cmd}: command not found`))
        report(lineInfo(`Set ${DEFAULTS.delegateEnvVar} to use another fallback command.`))
        return 127
      }
      if (isPermissionDenied(err)) {
        report(lineErr(`${cmd}: permission denied`))
        return 126
      }
      throw err
    }
  }
}
