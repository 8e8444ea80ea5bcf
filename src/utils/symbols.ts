/**
 * Diagnostic prefixes - pure ASCII, since stderr may be a dumb terminal.
 */

export const symbols = {
  info: 'i',
  warn: '!',
} as const
