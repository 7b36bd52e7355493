import { BatchResult, DispatchOutcome } from './push.contracts';

/**
 * Collects exactly one outcome per input slot. Workers may record in any
 * order; the result always comes back in input order.
 */
export class ResultAggregator {
  private readonly outcomes: (DispatchOutcome | undefined)[];
  private recorded = 0;

  constructor(readonly size: number) {
    this.outcomes = Array.from({ length: size }, () => undefined);
  }

  record(index: number, outcome: DispatchOutcome): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new RangeError(`Outcome index ${index} outside batch of ${this.size}`);
    }
    if (this.outcomes[index] !== undefined) {
      throw new Error(`Outcome for index ${index} already recorded`);
    }
    this.outcomes[index] = outcome;
    this.recorded++;
  }

  get pending(): number {
    return this.size - this.recorded;
  }

  isComplete(): boolean {
    return this.recorded === this.size;
  }

  toBatchResult(): BatchResult {
    const result: DispatchOutcome[] = [];
    for (const [index, outcome] of this.outcomes.entries()) {
      if (outcome === undefined) {
        throw new Error(`Batch incomplete: no outcome for index ${index}`);
      }
      result.push(outcome);
    }
    return Object.freeze(result);
  }
}
