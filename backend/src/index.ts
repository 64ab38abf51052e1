/**
 * Cellar Backend — Public API
 */

export { createApp, VERSION } from './app';
export type { AppContext } from './app';
export { loadConfig } from './config';
export type { Config } from './config';
export { JobRegistry } from './jobs';
export type { DependencyJob, InstallJob, Job, JobStatus } from './jobs';
export type { InstallService } from './service';
export { mcpRoutes, TOOLS, RpcCode, PROTOCOL_VERSION } from './routes/mcp';
