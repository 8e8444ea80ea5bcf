import { resolveConfig } from './config'
import { createDelegate } from './core/delegate'
import { dispatch } from './core/dispatcher'
import { lineErr, lineWarn } from './ui/renderer'

async function main(): Promise<void> {
  const config = resolveConfig(process.env)

  process.exitCode = await dispatch(process.argv.slice(2), {
    write: (bytes) => {
      process.stdout.write(bytes)
    },
    delegate: createDelegate(config),
    warn: (message) => {
      process.stderr.write(lineWarn(message) + '\n')
    },
  })
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err)
  process.stderr.write(lineErr(msg) + '\n')
  process.exitCode = 1
})
