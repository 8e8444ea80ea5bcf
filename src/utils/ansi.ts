export const ESC = '\u001B'
const CSI = `${ESC}[`

export const ansi = {
  bell: '\u0007',

  /** Reset all attributes */
  reset: `${CSI}0m`,
  bold: `${CSI}1m`,
  dim: `${CSI}2m`,
  blink: `${CSI}5m`,
  reverse: `${CSI}7m`,

  saveCursor: `${CSI}7`,
  restoreCursor: `${CSI}8`,

  showCursor: `${CSI}?25h`,
  hideCursor: `${CSI}?25l`,

  /** Enable the terminal's alternate screen buffer */
  altScreenEnter: `${CSI}?1049h`,
  /** Restore the main screen buffer */
  altScreenExit: `${CSI}?1049l`,

  home: `${CSI}H`,
  /** Clear the entire screen */
  clearScreen: `${CSI}2J`,
} as const

export function foreground256(color: string): string {
  return `${CSI}38;5;${color}m`
}

export function background256(color: string): string {
  return `${CSI}48;5;${color}m`
}

export function cursorTo(row: bigint, col: bigint): string {
  return `${CSI}${row};${col}H`
}

// Counts are passed through as written by the caller.
export function cursorUp(n: string): string {
  return `${CSI}${n}A`
}

export function cursorDown(n: string): string {
  return `${CSI}${n}B`
}

export function cursorForward(n: string): string {
  return `${CSI}${n}C`
}

export function cursorBack(n: string): string {
  return `${CSI}${n}D`
}
