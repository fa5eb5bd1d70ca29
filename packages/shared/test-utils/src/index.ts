export { createMockDatabase, createMockRedis } from './db-helpers.js';
export { delay, createScriptedProbe, createHangingProbe, createThrowingProbe, type ScriptedProbe } from './probe-helpers.js';
export { startStalledServer, waitForConnections, type StalledServer } from './http-helpers.js';
