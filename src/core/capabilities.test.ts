import { describe, expect, it } from 'vitest'

import { capabilityNames, lookupCapability, renderRule, toInteger } from './capabilities'

const ESC = '\u001B'

function render(name: string, ...args: string[]): string | undefined {
  const rule = lookupCapability(name)
  return rule ? renderRule(rule, args) : undefined
}

const SEQUENCES: Array<[string, string[], string]> = [
  ['bel', [], '\u0007'],
  ['sgr0', [], `${ESC}[0m`],
  ['me', [], `${ESC}[0m`],
  ['bold', [], `${ESC}[1m`],
  ['dim', [], `${ESC}[2m`],
  ['rev', [], `${ESC}[7m`],
  ['blink', [], `${ESC}[5m`],
  ['setaf', ['1'], `${ESC}[38;5;1m`],
  ['AF', ['196'], `${ESC}[38;5;196m`],
  ['setab', ['4'], `${ESC}[48;5;4m`],
  ['AB', ['0'], `${ESC}[48;5;0m`],
  ['sc', [], `${ESC}[7`],
  ['rc', [], `${ESC}[8`],
  ['cnorm', [], `${ESC}[?25h`],
  ['civis', [], `${ESC}[?25l`],
  ['smcup', [], `${ESC}[?1049h`],
  ['rmcup', [], `${ESC}[?1049l`],
  ['clear', [], `${ESC}[H${ESC}[2J`],
  ['home', [], `${ESC}[H`],
  ['cuu', ['3'], `${ESC}[3A`],
  ['cud', ['2'], `${ESC}[2B`],
  ['cuf', ['10'], `${ESC}[10C`],
  ['cub', ['1'], `${ESC}[1D`],
  ['cup', ['0', '0'], `${ESC}[1;1H`],
  ['cup', ['4', '9'], `${ESC}[5;10H`],
]

describe('capability table', () => {
  it.each(SEQUENCES)('%s %j', (name, args, expected) => {
    expect(render(name, ...args)).toBe(expected)
  })

  it('lists every built-in name, aliases included', () => {
    expect(capabilityNames().sort()).toEqual(
      [
        'AB', 'AF', 'bel', 'blink', 'bold', 'civis', 'clear', 'cnorm', 'cub', 'cud', 'cuf',
        'cup', 'cuu', 'dim', 'home', 'me', 'rc', 'rev', 'rmcup', 'sc', 'setab', 'setaf',
        'sgr0', 'smcup',
      ].sort(),
    )
  })

  it('maps aliases to the same rule', () => {
    expect(lookupCapability('me')).toBe(lookupCapability('sgr0'))
    expect(lookupCapability('AF')).toBe(lookupCapability('setaf'))
    expect(lookupCapability('AB')).toBe(lookupCapability('setab'))
  })

  it('matches names exactly', () => {
    expect(lookupCapability('Bold')).toBeUndefined()
    expect(lookupCapability('bold ')).toBeUndefined()
    expect(lookupCapability('cols')).toBeUndefined()
    expect(lookupCapability('toString')).toBeUndefined()
    expect(lookupCapability('__proto__')).toBeUndefined()
  })

  it('keeps rules frozen', () => {
    const rule = lookupCapability('bold')
    expect(Object.isFrozen(rule)).toBe(true)
  })

  it('clear is 8 bytes', () => {
    expect(Buffer.byteLength(render('clear') ?? '')).toBe(8)
  })
})

describe('argument handling', () => {
  it('ignores extra arguments for constant sequences', () => {
    expect(render('bold', '1', '2')).toBe(`${ESC}[1m`)
  })

  it('inserts single arguments verbatim', () => {
    expect(render('setaf', '007')).toBe(`${ESC}[38;5;007m`)
    expect(render('cuu', 'x')).toBe(`${ESC}[xA`)
  })

  it('leaves the slot empty when the argument is missing', () => {
    expect(render('setaf')).toBe(`${ESC}[38;5;m`)
  })

  it('reads cup operands like shell arithmetic', () => {
    expect(render('cup')).toBe(`${ESC}[1;1H`)
    expect(render('cup', 'row', '2')).toBe(`${ESC}[1;3H`)
    expect(render('cup', ' 7 ', '-1')).toBe(`${ESC}[8;0H`)
  })

  it('ignores a third cup argument', () => {
    expect(render('cup', '1', '1', '9')).toBe(`${ESC}[2;2H`)
  })

  it('keeps large cup operands in plain decimal, wrapped to 64 bits', () => {
    expect(render('cup', '99999999999999999999', '0')).toBe(`${ESC}[7766279631452241920;1H`)
    expect(render('cup', '9223372036854775807', '-1')).toBe(`${ESC}[-9223372036854775808;0H`)
  })
})

describe('toInteger', () => {
  const cases: Array<[string | undefined, bigint]> = [
    [undefined, 0n],
    ['', 0n],
    ['12', 12n],
    ['+4', 4n],
    ['-3', -3n],
    ['010', 10n],
    ['5px', 5n],
    ['0x10', 0n],
    ['abc', 0n],
    ['18446744073709551617', 1n],
  ]

  it.each(cases)('%j -> %s', (raw, expected) => {
    expect(toInteger(raw)).toBe(expected)
  })
})
