import type { FastifyBaseLogger } from 'fastify';

type TaskLogger = Pick<FastifyBaseLogger, 'error' | 'debug'>;

/**
 * Runs detached background work (webhook replies, interaction records).
 * `enqueue` returns immediately; a task that fails is logged and does not
 * affect the caller or any other task.
 */
export class TaskQueue {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly log: TaskLogger) {}

  enqueue(name: string, task: () => Promise<void>): void {
    const run = Promise.resolve()
      .then(task)
      .then(
        () => this.log.debug({ task: name }, 'task finished'),
        (err: unknown) => this.log.error({ task: name, err }, 'task failed'),
      )
      .finally(() => {
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);
  }

  get size(): number {
    return this.inFlight.size;
  }

  /** Resolves once every task queued so far (and any they queue) has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
