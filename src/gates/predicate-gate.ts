// Path: src/gates/predicate-gate.ts
// Gate whose condition is a function supplied by the caller

import { CompletionGate, type CompletionGateOptions } from '../completion-gate.js';

export type Predicate = () => boolean | Promise<boolean>;

/**
 * Gate around an arbitrary predicate, for conditions that do not warrant
 * their own subclass.
 *
 * @example
 * const gate = new PredicateGate('queue drained', () => queue.length === 0);
 * await gate.wait(10);
 */
export class PredicateGate extends CompletionGate {
  private readonly description: string;
  private readonly predicate: Predicate;

  constructor(description: string, predicate: Predicate, options: CompletionGateOptions = {}) {
    super(options);
    this.description = description;
    this.predicate = predicate;
  }

  protected isConditionMet(): boolean | Promise<boolean> {
    return this.predicate();
  }

  describe(): string {
    return `<PredicateGate: ${this.description}>`;
  }
}
