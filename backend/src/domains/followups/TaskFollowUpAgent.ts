/**
 * @module domains/followups/TaskFollowUpAgent
 *
 * Writes a reminder for every assignee of every overdue task (due before
 * today, not done) and stores it as a pending follow-up. One failing
 * reminder is logged and skipped; cancellation stops the whole run.
 */

import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import { isAbortError, throwIfAborted } from '@/shared/utils/retry';
import type { DomainStore, Task, User } from '@/domains/projects';
import type { RetryingGenerator } from '@/domains/agent/generation';
import type { FollowUpService } from './FollowUpService';

const DUE_DATE_FORMAT = new Intl.DateTimeFormat('en-US', {
  month: 'long',
  day: 'numeric',
  year: 'numeric',
  timeZone: 'UTC',
});

/** First word of the full name, else the email. */
export function recipientName(user: User): string {
  const firstName = user.fullName?.trim().split(/\s+/)[0];
  return firstName || user.email;
}

export function followUpReason(task: Task): string {
  if (!task.dueDate) {
    return 'This task is overdue.';
  }
  return `This task was due on ${DUE_DATE_FORMAT.format(new Date(`${task.dueDate}T00:00:00Z`))}.`;
}

export interface TaskFollowUpAgentDeps {
  domainStore: DomainStore;
  generator: Pick<RetryingGenerator, 'generate'>;
  followUps: FollowUpService;
  logger?: Logger;
}

export interface FollowUpRunOptions {
  signal?: AbortSignal;
}

export class TaskFollowUpAgent {
  private readonly log: Logger;

  constructor(private readonly deps: TaskFollowUpAgentDeps) {
    this.log = deps.logger ?? createChildLogger({ service: 'TaskFollowUpAgent' });
  }

  /**
   * @returns Number of follow-ups created
   */
  async run(now: Date = new Date(), options: FollowUpRunOptions = {}): Promise<number> {
    const { signal } = options;
    const today = now.toISOString().slice(0, 10);
    const overdue = await this.deps.domainStore.transaction((store) => store.listOverdueTasks(today));

    if (overdue.length === 0) {
      this.log.info({ today }, 'No overdue tasks');
      return 0;
    }

    let created = 0;
    for (const { task, assignees } of overdue) {
      const reason = followUpReason(task);

      for (const assignee of assignees) {
        throwIfAborted(signal);
        try {
          const message = await this.deps.generator.generate(
            { userName: recipientName(assignee), taskTitle: task.title, reason },
            { signal }
          );
          await this.deps.followUps.create({ taskId: task.id, userId: assignee.id, message });
          created += 1;
        } catch (error) {
          if (isAbortError(error)) {
            throw error;
          }
          this.log.error({ err: error, taskId: task.id, userId: assignee.id }, 'Failed to create follow-up');
        }
      }
    }

    this.log.info({ today, tasks: overdue.length, created }, 'Follow-up run completed');
    return created;
  }
}
