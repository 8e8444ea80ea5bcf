export const name = 'ansicap'
export const version = '1.0.0'

export function versionLine(): string {
  return `${name} (${version})`
}
