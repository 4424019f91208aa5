// Application: fire-and-forget work that must not fail the request that started it

import { Logger, describeError } from '@/utils/logger.js';

export class BackgroundTasks {
  private pending = new Set<Promise<void>>();

  constructor(private logger: Logger = new Logger('Tasks')) {}

  /**
   * Start a task now; failures are logged, never rethrown
   */
  run(label: string, task: () => Promise<void>): void {
    const tracked = Promise.resolve()
      .then(task)
      .catch((error: unknown) => {
        this.logger.error('Background task failed', { task: label, error: describeError(error) });
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Wait until every started task has settled (tasks started meanwhile included)
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }
}
