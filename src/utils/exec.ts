import { spawn } from 'node:child_process'
import { constants } from 'node:os'

export interface ExecResult {
  cmd: string
  args: string[]
  code: number | null
  signal: NodeJS.Signals | null
}

export class ExecSpawnError extends Error {
  override name = 'ExecSpawnError'
  code?: string
  errno?: number
  syscall?: string

  constructor(message: string, props: Pick<ExecSpawnError, 'code' | 'errno' | 'syscall'>) {
    super(message)
    this.code = props.code
    this.errno = props.errno
    this.syscall = props.syscall
  }
}

/**
 * Runs `cmd` attached to our own stdio and waits for it to exit.
 * Nothing is captured; the child writes straight to the terminal.
 */
export async function execInherit(cmd: string, args: string[] = []): Promise<ExecResult> {
  return new Promise<ExecResult>((resolve, reject) => {
    const child = spawn(cmd, args, {
      windowsHide: true,
      stdio: 'inherit',
    })

    child.on('error', (err) => {
      const e: NodeJS.ErrnoException = err
      reject(
        new ExecSpawnError(e.message || 'spawn failed', {
          code: e.code,
          errno: e.errno,
          syscall: e.syscall,
        }),
      )
    })

    child.on('close', (code, signal) => {
      resolve({ cmd, args, code, signal })
    })
  })
}

/** Shell-style status: the exit code, or 128 + signal number. */
export function exitStatusOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code != null) return code
  if (signal != null) return 128 + signalNumber(signal)
  return 1
}

function signalNumber(signal: NodeJS.Signals): number {
  // SIGINFO, SIGLOST and a few others are missing on Linux.
  return constants.signals[signal] ?? 0
}

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}

export function isCommandNotFound(err: unknown): boolean {
  return hasErrorCode(err, 'ENOENT')
}

export function isPermissionDenied(err: unknown): boolean {
  return hasErrorCode(err, 'EACCES')
}
