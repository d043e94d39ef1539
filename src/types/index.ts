/**
 * Types Index
 *
 * Re-exports all types from domain-specific files.
 */

export * from './backend'
export * from './bond'
export * from './common'
export * from './settings'
