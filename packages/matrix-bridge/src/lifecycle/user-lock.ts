/**
 * Serializes tasks per user: a task starts only after every earlier task for
 * the same user has settled. Different users never wait on each other.
 */
export class UserLock {
  private readonly tails = new Map<number, Promise<void>>();

  public async run<T>(userId: number, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(userId) ?? Promise.resolve();

    const current = previous.then(task);
    const tail = current.then(
      () => undefined,
      () => undefined
    );

    this.tails.set(userId, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(userId) === tail) this.tails.delete(userId);
    }
  }
}
