export type LeadingAction = 'delegate' | 'version'

export interface OptionProblem {
  kind: 'unknown-option' | 'missing-argument'
  option: string
}

export interface ScannedArgs {
  /** Argument vector exactly as received; this is what gets delegated. */
  argv: readonly string[]
  /** -S */
  forceDelegate: boolean
  /** -V */
  version: boolean
  /** Whichever of -S / -V was seen first. */
  firstAction?: LeadingAction
  /** -T <term>; accepted, never consulted for built-in capabilities. */
  terminal?: string
  /** Everything after the options: capability name, then its arguments. */
  operands: string[]
  problems: OptionProblem[]
}

export function scanOptions(argv: readonly string[]): ScannedArgs {
  const scanned: ScannedArgs = {
    argv,
    forceDelegate: false,
    version: false,
    operands: [],
    problems: [],
  }

  // A getopts loop has already returned once -S or -V decided the outcome.
  const problem = (p: OptionProblem) => {
    if (scanned.firstAction == null) scanned.problems.push(p)
  }

  let i = 0

  while (i < argv.length) {
    const a = argv[i] ?? ''

    if (a === '--') {
      i++
      break
    }

    // A lone `-` is an operand, as is anything not starting with `-`.
    if (!a.startsWith('-') || a === '-') break

    // Clusters: -SV, -Txterm, -ST xterm
    let j = 1
    while (j < a.length) {
      const ch = a.charAt(j)

      if (ch === 'S') {
        scanned.forceDelegate = true
        scanned.firstAction ??= 'delegate'
        j++
        continue
      }

      if (ch === 'V') {
        scanned.version = true
        scanned.firstAction ??= 'version'
        j++
        continue
      }

      if (ch === 'T') {
        const attached = a.slice(j + 1)
        if (attached) {
          scanned.terminal = attached
        } else if (i + 1 < argv.length) {
          i++
          scanned.terminal = argv[i]
        } else {
          problem({ kind: 'missing-argument', option: ch })
        }
        break
      }

      problem({ kind: 'unknown-option', option: ch })
      j++
    }

    i++
  }

  scanned.operands = argv.slice(i)
  return scanned
}

export function describeProblem(p: OptionProblem): string {
  return p.kind === 'missing-argument'
    ? `option requires an argument -- ${p.option}`
    : `illegal option -- ${p.option}`
}
