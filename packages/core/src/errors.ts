import type { z } from 'zod';

/**
 * Thrown when a computation is advanced again after it already returned
 * `ready`. This is a bug in whoever drives the computation.
 */
export class ComputationResolvedError extends Error {
  public readonly computation: string;

  public constructor(computation: string) {
    super(`${computation} was advanced after it already resolved`);
    this.name = 'ComputationResolvedError';
    this.computation = computation;
  }
}

export class TaskAbortedError extends Error {
  public readonly taskId: number;

  public constructor(taskId: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Task ${taskId} aborted: ${detail}`, { cause });
    this.name = 'TaskAbortedError';
    this.taskId = taskId;
  }
}

export class TaskReentrancyError extends Error {
  public readonly taskId: number;

  public constructor(taskId: number) {
    super(`Task ${taskId} is already being advanced`);
    this.name = 'TaskReentrancyError';
    this.taskId = taskId;
  }
}

export class ExecutorShutdownError extends Error {
  public constructor(executor: string) {
    super(`Executor ${executor} has been shut down and accepts no new tasks`);
    this.name = 'ExecutorShutdownError';
  }
}

export class ExecutorBusyError extends Error {
  public constructor(executor: string) {
    super(`Executor ${executor} is already running`);
    this.name = 'ExecutorBusyError';
  }
}

export class ConfigError extends Error {
  public readonly issues: z.ZodIssue[];

  public constructor(issues: z.ZodIssue[]) {
    const detail = issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');

    super(`Invalid runtime config: ${detail}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class ChannelClosedError extends Error {
  public constructor(channel: string) {
    super(`${channel} is closed`);
    this.name = 'ChannelClosedError';
  }
}
