export {
  runAgentRequestSchema,
  threadIdParamSchema,
  followUpListQuerySchema,
  followUpIdParamSchema,
  validateSafe,
} from './agent.schemas';
export type { RunAgentRequest, FollowUpListQuery, ValidationResult } from './agent.schemas';
