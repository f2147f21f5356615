/**
 * @shardwatch/alert-bus — Public API
 *
 *   import { AlertBus, envelope } from '@shardwatch/alert-bus'
 */

export { AlertBus } from './alert-bus'
export type { AlertSubscription, AlertBusStats } from './alert-bus'
export { envelope } from './publisher'
