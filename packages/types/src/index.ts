/**
 * Shared type definitions for the GF(2^m) toolkit
 *
 * Result tuples, error classes and field value shapes used by every package.
 */

export * from './errors'
export * from './field'
export * from './safe'
