/**
 * Checkpoint connection factories, one per STORAGE_DRIVER.
 */

import { MemorySaver } from '@langchain/langgraph-checkpoint';
import { openDedicatedPool } from '@/infrastructure/database/database';
import { MSSQLSaver, createPoolRunner } from './MSSQLSaver';
import type { CheckpointConnectionFactory } from './CheckpointerSupervisor';

/**
 * Dedicated single-connection pool plus MSSQLSaver. Tables are created on connect.
 */
export function createMSSQLConnectionFactory(): CheckpointConnectionFactory {
  return {
    name: 'mssql',
    async open(signal) {
      const pool = await openDedicatedPool(signal);
      const saver = new MSSQLSaver(createPoolRunner(pool));

      try {
        await saver.setup();
      } catch (error) {
        await pool.close();
        throw error;
      }

      return { saver, close: () => pool.close() };
    },
  };
}

/**
 * In-process saver for development and tests. State is lost on restart.
 */
export function createMemoryConnectionFactory(): CheckpointConnectionFactory {
  return {
    name: 'memory',
    async open() {
      return { saver: new MemorySaver(), close: async () => undefined };
    },
  };
}
