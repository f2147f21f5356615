/**
 * @shardwatch/types — Main Export
 *
 * The shared language between the enforcer, its collaborators and the CLI.
 */

export * from './alerts'
export * from './logger'
