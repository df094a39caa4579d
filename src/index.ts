export type { AiClientType, CompletionClient, CompletionClientOptions } from './core/ai/interfaces';
export type { LabelRules, PullRequest, PullRequestHost } from './core/hosting/interfaces';
export type {
  TicketClient,
  TicketClientOptions,
  TicketRecord,
  TicketToolType,
} from './core/tickets/interfaces';
export type {
  BranchSynchronizer,
  CommitDetail,
  GitIdentity,
  MergeErrorClassifier,
} from './core/vcs/interfaces';

export { createCompletionClient, ClaudeClient, GeminiClient, GptClient } from './adapters/ai';
export { GitHubHost, type GitHubHostConfig } from './adapters/hosting/github-host';
export { labelsForFiles } from './adapters/hosting/label-rules';
export { ClickUpClient, createTicketClient, JiraClient } from './adapters/tickets';
export { GitWrapper } from './adapters/vcs/git-wrapper';
export { run } from './cli';
export { SettingsService } from './services/config/settings-service';
export { ConfigFileError, type Settings, type SettingsOverrides } from './services/config/types';
export { buildFallbackPrompts, buildPullRequestPrompts } from './services/prompts/prompt-builder';
export { parseBody, parseTitle } from './services/prompts/response-parser';
export { createPullRequestWorkflow, PullRequestWorkflow } from './services/pull-request';
export { extractTicketId, formatTicketId } from './services/tickets/ticket-references';
export {
  BranchSyncService,
  compareTips,
  createBranchSyncService,
  type TipRelation,
} from './services/vcs/branch-sync-service';
export { isMergeConflictError } from './services/vcs/conflict-classifier';
export {
  BranchNotFoundError,
  type BranchSyncOptions,
  DetachedHeadError,
  GitSyncError,
  MergeConflictError,
  PushRejectedError,
  RemoteBranchNotFoundError,
  RemoteNotFoundError,
} from './services/vcs/types';
export {
  ApiClientError,
  CompletionError,
  ConfigurationError,
  HostingError,
  PrCreatorError,
  TicketClientError,
} from './utils/errors';
export { logger, Logger } from './utils/logger';
