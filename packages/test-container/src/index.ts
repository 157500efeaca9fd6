export * from './lib/config';
export * from './lib/containerEngine.port';
export * from './lib/containerLauncher';
export * from './lib/containerVariant';
export * from './lib/dockerEngine.client';
export * from './lib/errors';
export * from './lib/faultChannel';
export * from './lib/genericContainer';
export * from './lib/hostEnvironment';
export * from './lib/imageReference';
export * from './lib/imageResolver';
export * from './lib/jsonLines.parser';
export * from './lib/logger.service';
export * from './lib/readinessProbe';
export * from './lib/shutdownGuard';
export * from './lib/terminationWatcher';
export * from './lib/testContainer';
export * from './lib/volumeDirectory';
