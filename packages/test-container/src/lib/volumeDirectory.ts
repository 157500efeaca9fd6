import { promises as fs } from 'node:fs';
import path from 'node:path';

import { shutdownGuard as defaultGuard, type ShutdownGuard } from './shutdownGuard';

export type VolumeDirectoryOptions = {
  /** Delete the directory at process exit (and on `remove()`). */
  temporary: boolean;
  baseDir?: string;
  guard?: ShutdownGuard;
};

export type VolumeDirectory = {
  path: string;
  remove: () => Promise<void>;
};

/** Creates a host directory to bind-mount into a container. */
export async function createVolumeDirectory(options: VolumeDirectoryOptions): Promise<VolumeDirectory> {
  const baseDir = path.resolve(options.baseDir ?? process.cwd());
  const directory = await fs.mkdtemp(path.join(baseDir, '.tmp-volume-'));

  const removeDirectory = () => fs.rm(directory, { recursive: true, force: true });
  const unregister = options.temporary
    ? (options.guard ?? defaultGuard).register(`volume ${directory}`, removeDirectory)
    : undefined;

  return {
    path: directory,
    remove: async () => {
      unregister?.();
      await removeDirectory();
    },
  };
}
