import { nanoid } from 'nanoid';
import type { ParamValue, TaskParams, TaskSnapshot } from '@deskpilot/shared';

/** One unit of work handed to a handler. Frozen once built. */
export type Task = Readonly<TaskSnapshot>;

export interface TaskInput {
  type: string;
  content: string;
  params?: Record<string, ParamValue>;
}

export function createTask(input: TaskInput): Task {
  return Object.freeze({
    id: nanoid(),
    type: input.type,
    content: input.content,
    params: Object.freeze({ ...(input.params ?? {}) }),
  });
}

/**
 * Build a new task carrying the extra params. The original is left as is;
 * supplied keys override existing ones.
 */
export function withParams(task: Task, params: TaskParams): Task {
  return createTask({
    type: task.type,
    content: task.content,
    params: { ...task.params, ...params },
  });
}
