/**
 * Launch Module
 *
 * Exports the launch sequence and its building blocks.
 */

export { Launcher } from './Launcher.js';
export type { LauncherDeps, LaunchedServer } from './Launcher.js';

export { setupShutdown, printBanner } from './bootstrap.js';

export {
  API_KEY_VAR,
  MODEL_VAR,
  PLACEHOLDER_API_KEY,
  DEFAULT_GEMINI_MODEL,
  ENV_TEMPLATE,
  ensureEnvFile,
  parseEnvironment,
  loadEnvironment,
  isConfigured,
  mask,
  getEnvSummary
} from './env.js';
export type { LauncherEnvironment } from './env.js';

export { findInterpreter, isModuleImportable, ensureDependencies } from './python.js';
export type { Interpreter, DependencyResult, DependencyStatus } from './python.js';

export { runChecks, checkExitCode } from './checks.js';
export type { CheckOutcome } from './checks.js';

export { ensureDirectories } from './directories.js';
export type { DirectoryResult } from './directories.js';

export { ServerProcess, describeStopResult } from './server.js';
export type { StopResult, StopMethod, StopSource } from './server.js';

export { API_ENDPOINTS, buildSummary, formatEndpoint } from './summary.js';
export type { EndpointInfo, SummaryOptions } from './summary.js';

export { ConsoleReporter, RecordingReporter } from './reporter.js';
export type { LaunchReporter, ReportEntry, ReportLevel } from './reporter.js';

export { waitForKeypress } from './prompt.js';
export type { KeyWaiter } from './prompt.js';

export { verifyApiKey, geminiGenerate, VERIFY_PROMPT } from './credentials.js';
export type { GenerateText, VerifyResult } from './credentials.js';
