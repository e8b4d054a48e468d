export type { FollowUp, CreateFollowUpInput, FollowUpStats } from './types';
export type { FollowUpRepository } from './FollowUpRepository';
export { emptyFollowUpStats } from './FollowUpRepository';
export { InMemoryFollowUpRepository } from './InMemoryFollowUpRepository';
export { MSSQLFollowUpRepository } from './MSSQLFollowUpRepository';
export { FollowUpService } from './FollowUpService';
export { TaskFollowUpAgent, recipientName, followUpReason } from './TaskFollowUpAgent';
export type { TaskFollowUpAgentDeps, FollowUpRunOptions } from './TaskFollowUpAgent';
export { FollowUpJob } from './FollowUpJob';
export type { FollowUpJobConfig } from './FollowUpJob';
