import { Command } from 'commander'
import { createElementCommand } from './commands/element'
import { createMinpolysCommand } from './commands/minpolys'
import {
  createAddTableCommand,
  createMulTableCommand,
} from './commands/tables'
import type { CliEnv } from './utils/env'

export const CLI_VERSION = '0.1.0'

export function createProgram(env: CliEnv): Command {
  const defaultField = env.GF2M_DEFAULT_FIELD
  return new Command('gf2m')
    .description('Arithmetic over binary extension fields GF(2^m)')
    .version(CLI_VERSION)
    .addCommand(createAddTableCommand(defaultField))
    .addCommand(createMulTableCommand(defaultField))
    .addCommand(createMinpolysCommand(defaultField))
    .addCommand(createElementCommand(defaultField))
}
