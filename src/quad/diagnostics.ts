/**
 * Resettable list of non-fatal failure messages.
 *
 * Higher-level passes (collapse sweeps, stair placement) record issues here
 * and keep traversing instead of aborting.
 */
export class Diagnostics {
  private readonly messages: string[] = [];

  fail(message: string): void {
    this.messages.push(message);
  }

  reset(): void {
    this.messages.length = 0;
  }

  /** Returns a copy of the recorded list. */
  failures(): string[] {
    return [...this.messages];
  }

  get hasFailures(): boolean {
    return this.messages.length > 0;
  }
}
