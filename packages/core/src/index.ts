/**
 * Core utilities for the GF(2^m) toolkit
 *
 * Logging and environment configuration shared by every package
 */

export * from './env'
export * from './logger'
export * from './zod'
