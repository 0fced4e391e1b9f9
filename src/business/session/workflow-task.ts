// SPDX-License-Identifier: Apache-2.0

import {v4 as uuidv4} from 'uuid';

export type WorkflowOutcome = {readonly status: 'success'} | {readonly status: 'failure'; readonly error: unknown};

/**
 * A background workflow. `result` never rejects.
 */
export interface WorkflowTask {
  readonly id: string;
  readonly operationName: string;
  readonly abortController: AbortController;
  readonly result: Promise<WorkflowOutcome>;
}

export type WorkflowBody = (signal: AbortSignal) => Promise<void>;

/**
 * The workflows started on one session that have not finished yet.
 */
export class WorkflowTasks {
  private readonly running: Map<string, WorkflowTask> = new Map<string, WorkflowTask>();

  /**
   * Starts `body` after the current call stack unwinds and returns at once.
   */
  public schedule(operationName: string, body: WorkflowBody): WorkflowTask {
    const id: string = uuidv4();
    const abortController: AbortController = new AbortController();

    const result: Promise<WorkflowOutcome> = Promise.resolve()
      .then((): Promise<void> => body(abortController.signal))
      .then(
        (): WorkflowOutcome => ({status: 'success'}),
        (error: unknown): WorkflowOutcome => ({status: 'failure', error}),
      )
      .finally((): void => {
        this.running.delete(id);
      });

    const task: WorkflowTask = {id, operationName, abortController, result};
    this.running.set(id, task);
    return task;
  }

  public get active(): WorkflowTask[] {
    return [...this.running.values()];
  }

  /**
   * Aborts every running workflow and waits for all of them to settle.
   */
  public async cancelAll(reason?: unknown): Promise<WorkflowOutcome[]> {
    const tasks: WorkflowTask[] = this.active;
    for (const task of tasks) {
      task.abortController.abort(reason);
    }
    return Promise.all(tasks.map((task: WorkflowTask): Promise<WorkflowOutcome> => task.result));
  }
}
