import { ValidationMode, Violation } from '../../models/validation-result';

/**
 * Gathers violations for one pipeline stage. In `first` mode the stage is
 * told to stop as soon as one violation is recorded.
 */
export class ViolationCollector {
  private readonly collected: Violation[] = [];

  constructor(readonly mode: ValidationMode = 'first') {}

  /** Returns true when the caller should stop checking. */
  add(violation: Violation): boolean {
    this.collected.push(violation);
    return this.mode === 'first';
  }

  get violations(): Violation[] {
    return [...this.collected];
  }

  get isEmpty(): boolean {
    return this.collected.length === 0;
  }
}
