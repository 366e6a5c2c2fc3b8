/**
 * Raised when a second error occurs while handling a first (e.g. cleanup failing after a
 * parse error). Mirrors the shape of the standard `SuppressedError`.
 */
export class SuppressedError extends Error {
  declare public readonly error: unknown;
  declare public readonly suppressed: unknown;

  constructor(error: unknown, suppressed: unknown, message?: string | undefined) {
    super(message ?? '');
    this.error = error;
    this.suppressed = suppressed;
  }
}

export class ErrorAccumulator {
  declare public hasError: boolean;
  declare public error: unknown;

  constructor() {
    this.hasError = false;
  }

  add(error: unknown) {
    if (this.hasError) {
      if (error !== this.error) {
        this.error = new SuppressedError(error, this.error);
      }
    } else {
      this.error = error;
      this.hasError = true;
    }
  }

  /**
   * Runs each task in turn, even if earlier tasks fail, collecting any errors.
   */
  async runAll(tasks: (() => unknown)[]) {
    for (const task of tasks) {
      try {
        await task();
      } catch (error: unknown) {
        this.add(error);
      }
    }
  }

  throwIfError() {
    if (this.hasError) {
      throw this.error;
    }
  }
}
