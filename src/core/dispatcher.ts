import type { DispatchIO, Resolution } from './types'
import { lookupCapability, renderRule } from './capabilities'
import { describeProblem, scanOptions } from '../cli/args'
import { versionLine } from '../version'

/**
 * Picks the built-in sequence for `operands[0]`, or hands the request off.
 * Table membership is the only criterion; an empty or missing name delegates.
 */
export function resolve(operands: readonly string[]): Resolution {
  const [name, ...args] = operands
  if (!name) return { kind: 'delegate' }

  const rule = lookupCapability(name)
  if (!rule) return { kind: 'delegate' }

  return { kind: 'builtin', name, bytes: renderRule(rule, args) }
}

/**
 * Handles one `tput`-style invocation and resolves to its exit status.
 *
 * Built-in capabilities are written without a trailing newline. Everything
 * delegated receives the argv as it came in, options included, and the
 * collaborator's status is returned untouched.
 */
export async function dispatch(argv: readonly string[], io: DispatchIO): Promise<number> {
  const scanned = scanOptions(argv)

  for (const p of scanned.problems) io.warn?.(describeProblem(p))

  if (scanned.firstAction === 'version') {
    io.write(`${versionLine()}\n`)
    return 0
  }

  if (scanned.firstAction === 'delegate') {
    return io.delegate(argv)
  }

  const res = resolve(scanned.operands)
  if (res.kind === 'delegate') return io.delegate(argv)

  io.write(res.bytes)
  return 0
}
