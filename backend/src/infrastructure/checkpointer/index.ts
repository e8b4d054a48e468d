/**
 * Checkpointer Module
 *
 * Durable LangGraph checkpoint storage behind a supervised connection.
 *
 * @module infrastructure/checkpointer
 */

export { MSSQLSaver, createPoolRunner, encodeEnvelope, decodeEnvelope } from './MSSQLSaver';
export type { SqlRunner, SerializedEnvelope } from './MSSQLSaver';
export {
  CheckpointerSupervisor,
  CheckpointerNotReadyError,
  CheckpointerAlreadyStartedError,
} from './CheckpointerSupervisor';
export type { CheckpointConnection, CheckpointConnectionFactory } from './CheckpointerSupervisor';
export { createMSSQLConnectionFactory, createMemoryConnectionFactory } from './connections';
