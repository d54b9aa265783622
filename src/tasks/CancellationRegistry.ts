/**
 * In-process registry of running provider calls, keyed by task id.
 * Cancelling a task aborts its in-flight call when it runs in this process.
 */

export class TaskCancelledError extends Error {
  constructor(readonly taskId: string) {
    super(`Task ${taskId} was cancelled`);
    this.name = 'TaskCancelledError';
  }
}

export class CancellationRegistry {
  private controllers = new Map<string, AbortController>();

  /**
   * Controller for the next provider call of `taskId`
   */
  register(taskId: string): AbortController {
    const controller = new AbortController();
    this.controllers.set(taskId, controller);
    return controller;
  }

  release(taskId: string, controller: AbortController): void {
    if (this.controllers.get(taskId) === controller) {
      this.controllers.delete(taskId);
    }
  }

  /**
   * Abort the running call of `taskId`. Returns false when none runs here.
   */
  cancel(taskId: string): boolean {
    const controller = this.controllers.get(taskId);
    if (!controller) return false;

    controller.abort(new TaskCancelledError(taskId));
    this.controllers.delete(taskId);
    return true;
  }

  /**
   * Whether `controller` was aborted by `cancel` rather than by a timeout
   */
  static wasCancelled(controller: AbortController): boolean {
    return controller.signal.aborted && controller.signal.reason instanceof TaskCancelledError;
  }

  get size(): number {
    return this.controllers.size;
  }
}
