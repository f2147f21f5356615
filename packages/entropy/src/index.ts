/**
 * @shardwatch/entropy — Public API
 *
 *   import { shannonEntropy, detectRegularity } from '@shardwatch/entropy'
 */

export {
  shannonEntropy,
  byteHistogram,
  MAX_ENTROPY_BITS_PER_BYTE,
} from './entropy-analyzer'

export {
  detectRegularity,
  analyzeRegularity,
  setBitFraction,
  MIN_REGULARITY_SAMPLE_BYTES,
  BIT_BALANCE_TOLERANCE,
  REPETITION_PATTERN_LENGTHS,
  REPETITION_FACTOR,
} from './regularity-detector'

export type {
  RegularityFinding,
  BitBalanceFinding,
  RepetitionFinding,
} from './regularity-detector'
