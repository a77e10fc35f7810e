/**
 * Testing helper utilities for fanout
 */

export { TestDatabase } from "./utils/test-db.js";
export type { TestDatabaseConfig } from "./utils/test-db.js";
export { createTestContext } from "./utils/context.js";
export type { TestContextOptions } from "./utils/context.js";
export { TestServer } from "./utils/server.js";
export type { TestServerOptions } from "./utils/server.js";
export {
  createTestHttpClient,
  httpRequest,
  httpGet,
  httpPost,
} from "./utils/http-client.js";
export type { HttpResponse, TestHttpClient } from "./utils/http-client.js";
export { testLogger, consoleLogger } from "./utils/test-logger.js";
export type { Logger } from "./utils/test-logger.js";
export {
  createScriptedStepRunner,
  stepResult,
} from "./utils/step-runner.js";
export type {
  ScriptedStepRunner,
  StepCall,
  StepScript,
} from "./utils/step-runner.js";
export {
  createTempDir,
  removeTempDir,
  writeWorkflowFile,
  waitFor,
} from "./utils/files.js";
