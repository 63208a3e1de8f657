/**
 * Provisioning options for multi-provider virtual machine requests
 * Main entry point for the package
 */

export * from './core'
export * from './errors'
export * from './providers/softlayer'
export { getLogger, type Logger } from './log/utils'
