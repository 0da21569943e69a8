#!/usr/bin/env tsx

import { logger } from '@gf2m/core'
import { createProgram } from './program'
import { loadCliEnv } from './utils/env'

// Load environment variables
const env = loadCliEnv()

// Stdout carries the tables; diagnostics go to stderr
logger.init({ stderrOnly: true })

createProgram(env).parse(process.argv)
