/**
 * @chessduel/test-utils
 *
 * Shared test utilities: in-process stand-ins for the engine process,
 * the render surface and the logger
 */

// Fake engine process
export {
  FakeEngine,
  FakeEngineTransport,
  createFakeEngine,
  type FakeEngineConfig,
} from './fakes/fake-engine.js';

// Render surface
export {
  RecordingRenderSurface,
  type RefreshCall,
  type RecordingRenderSurfaceConfig,
} from './fakes/recording-render-surface.js';

// Loggers
export {
  createNullLogger,
  createTrackingLogger,
  type TrackingLogger,
  type LogEntry,
  type LogLevel,
} from './mocks/mock-logger.js';
