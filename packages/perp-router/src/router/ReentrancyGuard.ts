import { RouterError, RouterErrorCode } from '../errors/RouterError';

/**
 * Per-session exclusive flag for state-changing calls.
 *
 * `run` holds the flag for the lifetime of the callback and releases it on
 * every exit path, including rejections.
 */
export class ReentrancyGuard {
  private held: Set<string> = new Set();

  isHeld(session: string): boolean {
    return this.held.has(session.toLowerCase());
  }

  async run<T>(session: string, fn: () => Promise<T>): Promise<T> {
    const release = this.acquire(session);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private acquire(session: string): () => void {
    const key = session.toLowerCase();
    if (this.held.has(key)) {
      throw new RouterError(RouterErrorCode.ReentrantCall, 'Another state-changing call is in flight', { session });
    }
    this.held.add(key);

    let released = false;
    return () => {
      if (!released) {
        released = true;
        this.held.delete(key);
      }
    };
  }
}
