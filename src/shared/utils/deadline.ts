/**
 * Wall-clock budget for one job attempt. Every wait inside the attempt
 * (sandbox exit, helper outcome) reads from the same instance so the waits
 * add up to the budget instead of each getting their own.
 */
export class Deadline {
  private constructor(
    readonly expiresAt: number,
    private readonly now: () => number,
  ) {}

  static after(budgetMs: number, now: () => number = Date.now): Deadline {
    return new Deadline(now() + budgetMs, now);
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  get expired(): boolean {
    return this.remainingMs() === 0;
  }
}
