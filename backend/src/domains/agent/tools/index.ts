export {
  ToolDispatcher,
  defineProjectTool,
  NO_USER_MESSAGE,
} from './ToolDispatcher';
export type {
  InjectedName,
  InjectedValues,
  ModelArgsSchema,
  ProjectTool,
  ProjectToolDefinition,
} from './ToolDispatcher';
export { PROJECT_TOOLS } from './projectTools';
export { normalizeToolInput } from './normalizeToolArgs';
