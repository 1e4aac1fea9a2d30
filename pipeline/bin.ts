import { hideBin } from 'yargs/helpers'
import { run } from './cli'
import { logger } from './logger'

run(hideBin(process.argv)).catch((err: unknown) => {
  logger.error(
    'Caption generation failed',
    err instanceof Error ? err : String(err),
  )
  process.exitCode = 1
})
