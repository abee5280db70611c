import { afterEach, describe, expect, it } from '@jest/globals';
import {
  TaskManager,
  sleep,
  type PeriodicTask,
} from '@infrastructure/scheduling/TaskManager.js';
import { createLoggerMock } from '../../utils/test-mocks.js';

/**
 * 轮询直到条件成立
 */
async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('waitFor timed out');
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

function countingTask(name: string, counter: { runs: number }): PeriodicTask {
  return {
    name,
    intervalMs: 10,
    backoffMs: 10,
    run: async () => {
      counter.runs++;
    },
  };
}

describe('TaskManager', () => {
  let manager: TaskManager | null = null;

  afterEach(async () => {
    await manager?.stop();
    manager = null;
  });

  it('启动前所有任务应该处于 not_running', () => {
    manager = new TaskManager(
      [countingTask('a', { runs: 0 }), countingTask('b', { runs: 0 })],
      createLoggerMock(),
    );

    const status = manager.getStatus();
    expect(status.running).toBe(false);
    expect(status.task_count).toBe(2);
    expect(status.tasks.map((task) => task.state)).toEqual([
      'not_running',
      'not_running',
    ]);
  });

  it('应该立即执行任务体并按间隔重复执行', async () => {
    const counter = { runs: 0 };
    manager = new TaskManager([countingTask('metrics_collection', counter)], createLoggerMock());

    manager.start();
    await waitFor(() => counter.runs >= 3);

    const [task] = manager.getStatus().tasks;
    expect(task?.state).toBe('running');
    expect(task?.iterations).toBeGreaterThanOrEqual(3);
    expect(task?.last_run_at).not.toBeNull();
  });

  it('重复启动应该只记录警告', () => {
    const logger = createLoggerMock();
    const counter = { runs: 0 };
    manager = new TaskManager([countingTask('a', counter)], logger);

    manager.start();
    manager.start();

    expect(logger.warn).toHaveBeenCalledWith('后台任务已在运行，忽略重复启动');
    expect(manager.getStatus().running).toBe(true);
  });

  it('任务体失败不应结束循环', async () => {
    const logger = createLoggerMock();
    let attempts = 0;
    manager = new TaskManager(
      [
        {
          name: 'alert_check',
          intervalMs: 10,
          backoffMs: 10,
          run: async () => {
            attempts++;
            if (attempts === 1) {
              throw new Error('database is locked');
            }
          },
        },
      ],
      logger,
    );

    manager.start();
    await waitFor(() => attempts >= 3);

    const [task] = manager.getStatus().tasks;
    expect(task?.state).toBe('running');
    expect(task?.last_error).toBeNull();
    expect(logger.error).toHaveBeenCalledWith('后台任务 alert_check 执行失败', {
      task: 'alert_check',
      error: 'database is locked',
      retryInMs: 10,
    });
  });

  it('停止后循环应该结束并可再次停止', async () => {
    const counter = { runs: 0 };
    manager = new TaskManager(
      [{ ...countingTask('cleanup', counter), intervalMs: 60_000 }],
      createLoggerMock(),
    );

    manager.start();
    await waitFor(() => counter.runs >= 1);
    await manager.stop();
    await manager.stop();

    const status = manager.getStatus();
    expect(status.running).toBe(false);
    expect(status.tasks[0]?.state).toBe('stopped');
    expect(counter.runs).toBe(1);
  });

  it('停止时应该等待正在执行的任务体完成', async () => {
    let finished = false;
    let started = false;
    manager = new TaskManager(
      [
        {
          name: 'health_check',
          intervalMs: 60_000,
          backoffMs: 60_000,
          run: async () => {
            started = true;
            await new Promise((resolve) => setTimeout(resolve, 30));
            finished = true;
          },
        },
      ],
      createLoggerMock(),
    );

    manager.start();
    await waitFor(() => started);
    await manager.stop();

    expect(finished).toBe(true);
    expect(manager.getStatus().tasks[0]?.state).toBe('stopped');
  });

  it('停止后可以重新启动', async () => {
    const counter = { runs: 0 };
    manager = new TaskManager(
      [{ ...countingTask('a', counter), intervalMs: 60_000 }],
      createLoggerMock(),
    );

    manager.start();
    await waitFor(() => counter.runs === 1);
    await manager.stop();
    manager.start();
    await waitFor(() => counter.runs === 2);

    expect(manager.getStatus().tasks[0]?.state).toBe('running');
  });
});

describe('sleep', () => {
  it('信号中止时应该立即返回', async () => {
    const controller = new AbortController();
    const startedAt = Date.now();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await pending;

    expect(Date.now() - startedAt).toBeLessThan(1000);
  });

  it('已中止的信号应该直接返回', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(60_000, controller.signal)).resolves.toBeUndefined();
  });
});
