/**
 * lanpaste: git-backed paste sharing for a local network.
 *
 * Public exports for programmatic use. The `lanpaste` binary lives in cli.ts.
 */

export { createApp, createAppContext, startServer } from './server';
export type { AppContext, AppContextOverrides, RunningServer } from './server';
export * from './config';
export * from './domain';
export * from './storage';
export { PasteService } from './service/paste-service';
export { ApiKeyStore, ClientAllowList, verifyToken } from './api/auth';
export { MinuteWindowLimiter } from './api/rate-limit';
export { renderMarkdown, escapeHtml } from './render/markdown';
export { renderPage, renderDashboard } from './render/pages';
export { createLogger, formatLogLine, isLevelEnabled, logger, LogLevel, setLogHandler, setLogLevel } from './logger';
export type { Logger, LogEntry } from './logger';
