export interface FallbackAttempt<T> {
  name: string;
  run: () => Promise<T>;
}

export interface FallbackFailure {
  name: string;
  error: unknown;
}

export type FallbackOutcome<T> =
  | { ok: true; value: T; name: string; failures: FallbackFailure[] }
  | { ok: false; failures: FallbackFailure[] };

/**
 * Ordered list of named attempts. `run` returns the first success together
 * with every failure that preceded it; it never throws on its own account.
 * `shouldContinue` can stop the chain early for errors that no later
 * attempt can fix.
 */
export class FallbackChain<T> {
  constructor(
    private readonly attempts: FallbackAttempt<T>[],
    private readonly shouldContinue: (error: unknown) => boolean = () => true,
  ) {}

  get names(): string[] {
    return this.attempts.map((a) => a.name);
  }

  async run(): Promise<FallbackOutcome<T>> {
    const failures: FallbackFailure[] = [];
    for (const attempt of this.attempts) {
      try {
        const value = await attempt.run();
        return { ok: true, value, name: attempt.name, failures };
      } catch (error: unknown) {
        failures.push({ name: attempt.name, error });
        if (!this.shouldContinue(error)) {
          break;
        }
      }
    }
    return { ok: false, failures };
  }
}
