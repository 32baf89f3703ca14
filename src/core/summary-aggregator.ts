/**
 * Summary Aggregator
 * Read-only counts over the whole task collection, recomputed on every call
 */

import type { TaskRow, TaskStatus, TaskSummary } from './types.js';
import type { TaskRepo } from './repos/task-repo.js';

export type SummarizableTask = Pick<TaskRow, 'status' | 'priority'>;

export function summarizeTasks(tasks: readonly SummarizableTask[]): TaskSummary {
  const byStatus: Record<TaskStatus, number> = { 'to-do': 0, 'in-progress': 0, 'await-feedback': 0, done: 0 };
  let urgent = 0;

  for (const task of tasks) {
    byStatus[task.status]++;
    if (task.priority === 'urgent') urgent++;
  }

  const total = tasks.length;
  const percentage = total > 0 ? roundTo2((byStatus.done / total) * 100) : 0;

  return {
    'to-do': byStatus['to-do'],
    'in-progress': byStatus['in-progress'],
    'await-feedback': byStatus['await-feedback'],
    done: byStatus.done,
    'total-tasks': total,
    urgent,
    'completed-percentage': percentage
  };
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class SummaryAggregator {
  constructor(private readonly tasks: TaskRepo) {}

  summarize(): TaskSummary {
    return summarizeTasks(this.tasks.list());
  }
}
