export {
  REQUEST_CONTEXT_KEY,
  parseThreadIdentity,
  createThreadId,
  createRequestContext,
  isRequestContext,
  withRequestContext,
  getRequestContext,
} from './RequestContext';
export type { RequestContext } from './RequestContext';
