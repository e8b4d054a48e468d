/**
 * @module domains/followups/MSSQLFollowUpRepository
 */

import type { ConnectionPool } from 'mssql';
import type { FollowUpStatus } from '@taskpilot/shared';
import { executeQuery, type SqlParams } from '@/infrastructure/database/database';
import { NotFoundError } from '@/domains/projects';
import { emptyFollowUpStats, type FollowUpRepository } from './FollowUpRepository';
import type { CreateFollowUpInput, FollowUp, FollowUpStats } from './types';

interface FollowUpRow {
  id: number;
  task_id: number;
  user_id: number;
  message: string;
  status: FollowUpStatus;
  created_at: Date;
  sent_at: Date | null;
  acknowledged_at: Date | null;
}

const COLUMNS = 'id, task_id, user_id, message, status, created_at, sent_at, acknowledged_at';
const INSERTED_COLUMNS = COLUMNS.split(', ')
  .map((column) => `INSERTED.${column}`)
  .join(', ');

function mapFollowUp(row: FollowUpRow): FollowUp {
  return {
    id: row.id,
    taskId: row.task_id,
    userId: row.user_id,
    message: row.message,
    status: row.status,
    createdAt: row.created_at,
    sentAt: row.sent_at,
    acknowledgedAt: row.acknowledged_at,
  };
}

export class MSSQLFollowUpRepository implements FollowUpRepository {
  constructor(private readonly pool: ConnectionPool) {}

  private async rows<T>(query: string, params?: SqlParams): Promise<T[]> {
    const result = await executeQuery<T>(this.pool, query, params);
    return result.recordset ?? [];
  }

  async create(input: CreateFollowUpInput): Promise<FollowUp> {
    const [row] = await this.rows<FollowUpRow>(
      `INSERT INTO task_follow_ups (task_id, user_id, message)
       OUTPUT ${INSERTED_COLUMNS}
       VALUES (@task_id, @user_id, @message)`,
      { task_id: input.taskId, user_id: input.userId, message: input.message }
    );
    if (!row) {
      throw new Error(`Follow-up for task ${input.taskId} was not created`);
    }
    return mapFollowUp(row);
  }

  async findById(id: number): Promise<FollowUp | null> {
    const [row] = await this.rows<FollowUpRow>(`SELECT ${COLUMNS} FROM task_follow_ups WHERE id = @id`, { id });
    return row ? mapFollowUp(row) : null;
  }

  async listForUser(userId: number, status?: FollowUpStatus): Promise<FollowUp[]> {
    const rows = await this.rows<FollowUpRow>(
      `SELECT ${COLUMNS} FROM task_follow_ups
        WHERE user_id = @user_id AND (@status IS NULL OR status = @status)
        ORDER BY created_at DESC, id DESC`,
      { user_id: userId, status: status ?? null }
    );
    return rows.map(mapFollowUp);
  }

  async countByStatus(userId: number): Promise<FollowUpStats> {
    const rows = await this.rows<{ status: FollowUpStatus; total: number }>(
      'SELECT status, COUNT(*) AS total FROM task_follow_ups WHERE user_id = @user_id GROUP BY status',
      { user_id: userId }
    );
    const stats = emptyFollowUpStats();
    for (const row of rows) {
      stats[row.status] = row.total;
    }
    return stats;
  }

  async updateStatus(id: number, status: FollowUpStatus, at: Date): Promise<FollowUp> {
    const [row] = await this.rows<FollowUpRow>(
      `UPDATE task_follow_ups
          SET status = @status,
              sent_at = CASE WHEN @status = N'sent' THEN @at ELSE sent_at END,
              acknowledged_at = CASE WHEN @status = N'acknowledged' THEN @at ELSE acknowledged_at END
       OUTPUT ${INSERTED_COLUMNS}
        WHERE id = @id`,
      { id, status, at }
    );
    if (!row) {
      throw NotFoundError.entity('Follow-up', id);
    }
    return mapFollowUp(row);
  }
}
