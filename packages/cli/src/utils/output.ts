import { logger } from '@gf2m/core'
import type { Safe } from '@gf2m/types'

/**
 * Print a command's output, or log its failure and exit with status 1
 */
export function printOrExit(result: Safe<string>): void {
  const [error, output] = result
  if (error) {
    logger.error('Command failed', error)
    process.exit(1)
  }
  console.log(output)
}
