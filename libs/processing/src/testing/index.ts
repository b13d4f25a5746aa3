/**
 * @docsense/processing/testing
 *
 * In-process stand-ins for the core's collaborators and clock.
 */
export { FakeClock } from './fake-clock';
export { InMemoryStorage, ScriptedAnalysis } from './fake-collaborators';
export type { StatusScript } from './fake-collaborators';
export { FakeAdaptersModule } from './fake-adapters.module';
