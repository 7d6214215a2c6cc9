export class LockReentryError extends Error {
  constructor(public readonly label: string) {
    super(`Lock "${label}" was re-entered while held; the caller would deadlock`);
    this.name = 'LockReentryError';
  }
}

/**
 * Mutual exclusion for a value shared by several progress handles.
 *
 * Critical sections are synchronous callbacks, so a section can never span an
 * `await` and sections from different async workers are serialized by the
 * event loop. What remains to guard against is re-entry from inside a section
 * (a sink logging back into the counter it is serving), which a blocking lock
 * would turn into a deadlock; here it throws instead.
 */
export class Mutex<T> {
  private held = false;

  constructor(
    private readonly value: T,
    private readonly label = 'progress'
  ) {}

  get isLocked(): boolean {
    return this.held;
  }

  lock<R>(section: (value: T) => R): R {
    if (this.held) {
      throw new LockReentryError(this.label);
    }

    this.held = true;
    try {
      return section(this.value);
    } finally {
      this.held = false;
    }
  }
}
