import type { Logger } from '@logging/logger.js';

export type TaskState = 'not_running' | 'running' | 'cancel_requested' | 'stopped';

/**
 * 周期任务定义
 */
export interface PeriodicTask {
  name: string;
  /** 正常执行后的等待时间（毫秒） */
  intervalMs: number;
  /** 执行失败后的等待时间（毫秒） */
  backoffMs: number;
  /**
   * 任务体，可在步骤之间检查 signal 提前结束
   */
  run(signal: AbortSignal): Promise<void>;
}

export interface TaskStatus {
  name: string;
  state: TaskState;
  iterations: number;
  last_error: string | null;
  /** ISO 8601 */
  last_run_at: string | null;
}

export interface TaskManagerStatus {
  running: boolean;
  task_count: number;
  tasks: TaskStatus[];
}

/**
 * 可被中断的等待，signal 中止时立即返回
 * @param ms 等待时间（毫秒）
 * @param signal 中止信号
 */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * 后台任务管理器
 * 每个任务是一个独立的异步循环：先执行一次，再按间隔等待；
 * 任务体抛出的异常只记录日志，等待退避时间后继续
 */
export class TaskManager {
  private readonly statuses: Map<string, TaskStatus> = new Map();
  private controller: AbortController | null = null;
  private loops: Promise<void>[] = [];

  constructor(
    private readonly tasks: PeriodicTask[],
    private readonly logger: Logger,
    private readonly now: () => number = Date.now,
  ) {
    for (const task of tasks) {
      this.statuses.set(task.name, {
        name: task.name,
        state: 'not_running',
        iterations: 0,
        last_error: null,
        last_run_at: null,
      });
    }
  }

  get isRunning(): boolean {
    return this.controller !== null;
  }

  /**
   * 启动所有任务循环，重复调用无效果
   */
  start(): void {
    if (this.controller) {
      this.logger.warn('后台任务已在运行，忽略重复启动');
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loops = this.tasks.map((task) => this.runLoop(task, controller.signal));
    this.logger.info('后台任务已启动', {
      tasks: this.tasks.map((task) => task.name),
    });
  }

  /**
   * 请求所有循环停止并等待它们结束
   * 正在执行的任务体会先完成
   */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      return;
    }

    for (const status of this.statuses.values()) {
      if (status.state === 'running') {
        status.state = 'cancel_requested';
      }
    }
    controller.abort();

    const results = await Promise.allSettled(this.loops);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn('后台任务退出时出错', {
          error:
            result.reason instanceof Error
              ? result.reason.message
              : String(result.reason),
        });
      }
    }

    this.loops = [];
    this.controller = null;
    this.logger.info('后台任务已停止');
  }

  getStatus(): TaskManagerStatus {
    return {
      running: this.isRunning,
      task_count: this.tasks.length,
      tasks: Array.from(this.statuses.values(), (status) => ({ ...status })),
    };
  }

  private async runLoop(task: PeriodicTask, signal: AbortSignal): Promise<void> {
    const status = this.statusOf(task.name);
    status.state = 'running';

    while (!signal.aborted) {
      let delay = task.intervalMs;
      try {
        await task.run(signal);
        status.last_error = null;
      } catch (error) {
        status.last_error = error instanceof Error ? error.message : String(error);
        delay = task.backoffMs;
        this.logger.error(`后台任务 ${task.name} 执行失败`, {
          task: task.name,
          error: status.last_error,
          retryInMs: delay,
        });
      }
      status.iterations++;
      status.last_run_at = new Date(this.now()).toISOString();

      await sleep(delay, signal);
    }

    status.state = 'stopped';
  }

  private statusOf(name: string): TaskStatus {
    const status = this.statuses.get(name);
    if (!status) {
      throw new Error(`Unknown task: ${name}`);
    }
    return status;
  }
}
