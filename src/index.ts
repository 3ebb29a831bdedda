export * from "./core/errors";
export { logger } from "./core/logger";
export * from "./domain/models";
export type { Condition, StepAction, WorkflowDefinition, WorkflowStep, WorkflowVerification } from "./domain/workflow";
export type { WorkflowStatus, WorkflowTransition } from "./domain/workflow-state-machine";
export type {
  LoginOptions,
  LoginResult,
  OperationOptions,
  PlatformAdapter,
  PostDetailOptions,
} from "./platforms/adapter";
export type { PlatformDefinition } from "./platforms/definition";
export { WebPlatformAdapter, type WebPlatformAdapterOptions } from "./platforms/web-platform.adapter";
export { AdapterRegistry, getPlatformDefinition, parsePlatform, supportedPlatforms } from "./platforms/registry";
export { xiaohongshu } from "./platforms/xiaohongshu";
export { Extractor, type ReadPlan } from "./services/extractor";
export { WorkflowEngine, type WorkflowReport } from "./orchestration/workflow-engine";
export { BrowserSessionManager, SessionRegistry, type SessionContext, type StepRecord } from "./services/session-manager";
export { ChromiumLauncher, type BrowserLauncher } from "./services/browser-session";
export type { PageDriver, DomScript, ScriptArgs } from "./services/page-driver";
export { MemorySessionStore, SqliteSessionStore, type SessionStore, type StoredSessionSummary } from "./services/session-store";
export { createSessionBlob, decodeSessionBlob } from "./services/session-blob";
export { createRuntime, type Runtime, type RuntimeOptions } from "./runtime";
