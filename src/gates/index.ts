// Path: src/gates/index.ts
// Concrete gate exports

export { PredicateGate, type Predicate } from './predicate-gate.js';
export { FileGate, type FileGateOptions } from './file-gate.js';
export { ProcessExitGate, type ProcessExitGateOptions, type LivenessCheck } from './process-gate.js';
