import lockfile from "proper-lockfile";

export type FileLockOptions = {
  retries: {
    retries: number;
    factor: number;
    minTimeout: number;
    maxTimeout: number;
    randomize: boolean;
  };
  stale: number;
};

export const DEFAULT_LOCK_OPTIONS: FileLockOptions = {
  retries: {
    retries: 6,
    factor: 1.6,
    minTimeout: 40,
    maxTimeout: 800,
    randomize: true,
  },
  stale: 15_000,
};

/**
 * Run `fn` while holding an advisory lock on `target`. The target does not need
 * to exist yet; the lock lives in a sibling `<target>.lock` directory.
 */
export async function withFileLock<T>(
  target: string,
  options: FileLockOptions,
  fn: () => Promise<T>,
): Promise<T> {
  const release = await lockfile.lock(target, {
    ...options,
    realpath: false,
  });
  try {
    return await fn();
  } finally {
    await release();
  }
}
