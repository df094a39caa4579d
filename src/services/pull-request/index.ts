export {
  FALLBACK_BODY,
  fallbackTitle,
  PullRequestWorkflow,
  type PullRequestWorkflowDependencies,
  type PullRequestWorkflowOptions,
} from './pull-request-workflow';
export { createPullRequestWorkflow } from './workflow-factory';
