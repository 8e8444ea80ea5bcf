import type { BinaryRule, CapabilityTable, ConstantRule, EmissionRule, UnaryRule } from './types'
import {
  ansi,
  background256,
  cursorBack,
  cursorDown,
  cursorForward,
  cursorTo,
  cursorUp,
  foreground256,
} from '../utils/ansi'

function constant(bytes: string): ConstantRule {
  const rule: ConstantRule = { kind: 'constant', bytes }
  return Object.freeze(rule)
}

function unary(render: (a1: string) => string): UnaryRule {
  const rule: UnaryRule = { kind: 'unary', render }
  return Object.freeze(rule)
}

function binary(shift: bigint, render: (a1: bigint, a2: bigint) => string): BinaryRule {
  const rule: BinaryRule = { kind: 'binary', shift, render }
  return Object.freeze(rule)
}

const sgr0 = constant(ansi.reset)
const setaf = unary(foreground256)
const setab = unary(background256)

// Aliases share the rule object rather than pointing at another key.
const TABLE: CapabilityTable = new Map<string, EmissionRule>([
  ['bel', constant(ansi.bell)],
  ['sgr0', sgr0],
  ['me', sgr0],
  ['bold', constant(ansi.bold)],
  ['dim', constant(ansi.dim)],
  ['rev', constant(ansi.reverse)],
  ['blink', constant(ansi.blink)],
  ['setaf', setaf],
  ['AF', setaf],
  ['setab', setab],
  ['AB', setab],
  ['sc', constant(ansi.saveCursor)],
  ['rc', constant(ansi.restoreCursor)],
  ['cnorm', constant(ansi.showCursor)],
  ['civis', constant(ansi.hideCursor)],
  ['smcup', constant(ansi.altScreenEnter)],
  ['rmcup', constant(ansi.altScreenExit)],
  ['clear', constant(ansi.home + ansi.clearScreen)],
  ['home', constant(ansi.home)],
  ['cuu', unary(cursorUp)],
  ['cud', unary(cursorDown)],
  ['cuf', unary(cursorForward)],
  ['cub', unary(cursorBack)],
  // Callers count rows and columns from 0, the terminal from 1.
  ['cup', binary(1n, cursorTo)],
])

export function lookupCapability(name: string): EmissionRule | undefined {
  return TABLE.get(name)
}

export function capabilityNames(): string[] {
  return [...TABLE.keys()]
}

const LEADING_INTEGER = /^\s*([+-]?\d+)/

/**
 * Leading-decimal-integer reading of an operand, wrapped to 64 bits.
 * Anything without a leading integer (including a missing argument) is 0.
 */
export function toInteger(raw: string | undefined): bigint {
  const m = raw == null ? null : LEADING_INTEGER.exec(raw)
  if (!m || m[1] == null) return 0n
  return BigInt.asIntN(64, BigInt(m[1]))
}

function shifted(raw: string | undefined, shift: bigint): bigint {
  return BigInt.asIntN(64, toInteger(raw) + shift)
}

export function renderRule(rule: EmissionRule, args: readonly string[]): string {
  switch (rule.kind) {
    case 'constant':
      return rule.bytes
    case 'unary':
      return rule.render(args[0] ?? '')
    case 'binary':
      return rule.render(shifted(args[0], rule.shift), shifted(args[1], rule.shift))
  }
}
