import pc from 'picocolors'

import { symbols } from '../utils/symbols'

export const sym = symbols

export function lineErr(text: string): string {
  return pc.red(text)
}

export function lineWarn(text: string): string {
  return pc.yellow(`${sym.warn} ${text}`)
}

export function lineInfo(text: string): string {
  return pc.dim(`${sym.info} ${text}`)
}
