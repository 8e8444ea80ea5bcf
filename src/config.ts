export const DEFAULTS = {
  /** The full utility anything unknown is handed to. */
  delegateCommand: 'tput',
  /** Overrides `delegateCommand`, e.g. when ansicap is installed as `tput` itself. */
  delegateEnvVar: 'ANSICAP_TPUT',
} as const

export interface Config {
  delegateCommand: string
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const override = env[DEFAULTS.delegateEnvVar]?.trim()
  return {
    delegateCommand: override ? override : DEFAULTS.delegateCommand,
  }
}
