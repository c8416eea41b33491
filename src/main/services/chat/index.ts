/**
 * @file Chat Module Entry
 * @description Exports the session store, prompt assembly and the query orchestrator
 * @depends ChatSessionStore, PromptBuilder, ChatOrchestrator
 */

export { ChatSessionStore, type CloseResult } from './ChatSessionStore';
export {
  ChatOrchestrator,
  type ChatOrchestratorConfig,
  type ChatOrchestratorDeps,
  parseQueryRequest,
} from './ChatOrchestrator';
export {
  PromptBuilder,
  type QaPayload,
  type QaPromptInput,
  type ReplyLanguage,
  detectReplyLanguage,
  processContext,
} from './PromptBuilder';
