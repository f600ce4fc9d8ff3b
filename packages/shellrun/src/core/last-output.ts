/**
 * Holds the stdout of the most recent completed attempt.
 *
 * Every runner sharing a cell overwrites it, so with several runners in
 * flight the value may come from any of them. Read it as advisory.
 */
export class LastOutputCell {
  private current: string | undefined;

  get value(): string | undefined {
    return this.current;
  }

  set(output: string): void {
    this.current = output;
  }

  reset(): void {
    this.current = undefined;
  }
}

/**
 * Cell shared by runners that are not given their own.
 */
export const defaultLastOutput = new LastOutputCell();
