/**
 * @ucitap/test-utils
 *
 * Shared test utilities: fixtures, an in-process engine and log builders
 */

// Fixture loading
export { getFixturePath, loadLogLinesSync } from './fixtures/loader.js';

// Engine stand-in
export {
  FakeEngineProcess,
  createFakeEngine,
  scriptedUciResponder,
  type EngineResponder,
  type FakeEngineConfig,
} from './mocks/fake-engine.js';

// Streams
export { MemoryWritable, FailingWritable } from './streams/memory.js';

// Builders
export { TapLogBuilder, tapLog, DEFAULT_LOG_START } from './builders/log-builder.js';
