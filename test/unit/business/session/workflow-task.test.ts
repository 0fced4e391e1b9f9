// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {
  type WorkflowOutcome,
  type WorkflowTask,
  WorkflowTasks,
} from '../../../../src/business/session/workflow-task.js';

describe('WorkflowTasks', (): void => {
  let tasks: WorkflowTasks;

  beforeEach((): void => {
    tasks = new WorkflowTasks();
  });

  it('should return before the workflow starts', async (): Promise<void> => {
    let started: boolean = false;
    const task: WorkflowTask = tasks.schedule('install', async (): Promise<void> => {
      started = true;
    });

    expect(started).to.be.false;
    expect(tasks.active).to.deep.equal([task]);
    expect(await task.result).to.deep.equal({status: 'success'});
    expect(started).to.be.true;
    expect(tasks.active).to.deep.equal([]);
  });

  it('should report a failing workflow without rejecting', async (): Promise<void> => {
    const failure: Error = new Error('apply failed');
    const task: WorkflowTask = tasks.schedule('install', async (): Promise<void> => {
      throw failure;
    });

    const outcome: WorkflowOutcome = await task.result;

    expect(outcome).to.deep.equal({status: 'failure', error: failure});
  });

  it('should give every task its own id', (): void => {
    const first: WorkflowTask = tasks.schedule('run_vet', async (): Promise<void> => {});
    const second: WorkflowTask = tasks.schedule('run_vet', async (): Promise<void> => {});

    expect(first.id).to.not.equal(second.id);
    expect(first.operationName).to.equal('run_vet');
  });

  it('should abort running workflows and wait for them', async (): Promise<void> => {
    const task: WorkflowTask = tasks.schedule(
      'install',
      (signal: AbortSignal): Promise<void> =>
        new Promise<void>((_resolve, reject): void => {
          if (signal.aborted) {
            reject(signal.reason);
            return;
          }
          signal.addEventListener('abort', (): void => {
            reject(signal.reason);
          });
        }),
    );

    const outcomes: WorkflowOutcome[] = await tasks.cancelAll(new Error('closing'));

    expect(task.abortController.signal.aborted).to.be.true;
    expect(outcomes).to.have.lengthOf(1);
    expect(outcomes[0].status).to.equal('failure');
    expect(outcomes[0]).to.have.nested.property('error.message', 'closing');
    expect(tasks.active).to.deep.equal([]);
  });
});
