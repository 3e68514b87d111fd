export * from './types';
export * from './errors';
export { getConfig, loadConfig, validateConfig, type AppConfig } from './config';
export { OpenAIModelClient, toUpstreamError, type ModelClient, type CompletionRequest, type CompletionResult, type ChatMessage } from './openai/client';
export { generatePlan, parsePlan } from './engine/plan';
export { generateFindings } from './engine/findings';
export { generateReport, parseReport } from './engine/report';
export { generateCritique, parseCritique } from './engine/critique';
export { runPipeline, runInSession, describeFailure, type PipelineOptions } from './engine/pipeline';
export { SessionStore, SessionNotFoundError, newSessionId } from './state/sessionStore';
export { exportSession, exportFileName, renderSession } from './export/markdown';
export { createRuntime, type Runtime } from './runtime';
export { createLogger, type Logger, type LogLevel } from './util/logger';
