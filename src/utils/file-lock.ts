import * as lockfile from "proper-lockfile";

export interface FileLockOptions {
  readonly retries?: number;
  /** Upper bound for the backoff between two attempts. */
  readonly maxTimeoutMs?: number;
  /** Age after which a lock left behind by a dead process is taken over. */
  readonly staleMs?: number;
}

export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
  opts?: FileLockOptions,
): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: {
        retries: opts?.retries ?? 5,
        minTimeout: 50,
        maxTimeout: opts?.maxTimeoutMs ?? Infinity,
      },
      stale: opts?.staleMs ?? 10_000,
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}
