export { DecoySink, DECOY_MARKERS } from './decoy-sink'
export type { DecoySinkOptions, DecoyPlacement, PoisonPlan } from './decoy-sink'
export { generateTrap, firstPrimes } from './traps'
export type { ComplexityLevel } from './traps'
