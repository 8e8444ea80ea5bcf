/** Emits fixed bytes; any arguments are ignored. */
export interface ConstantRule {
  kind: 'constant'
  bytes: string
}

/** One argument, inserted as written. */
export interface UnaryRule {
  kind: 'unary'
  render: (a1: string) => string
}

/** Two 64-bit integer arguments, each offset by `shift` before substitution. */
export interface BinaryRule {
  kind: 'binary'
  shift: bigint
  render: (a1: bigint, a2: bigint) => string
}

export type EmissionRule = ConstantRule | UnaryRule | BinaryRule

export type CapabilityTable = ReadonlyMap<string, EmissionRule>

export type Resolution =
  | { kind: 'builtin'; name: string; bytes: string }
  | { kind: 'delegate' }

export interface DispatchIO {
  /** Receives capability bytes or the version line, verbatim. */
  write(bytes: string): void
  /** Runs the external utility with the original argv and resolves to its exit status. */
  delegate(argv: readonly string[]): Promise<number>
  /** Option-scanning diagnostics. Dropped when omitted. */
  warn?(message: string): void
}
