export interface IThreadLock {
  /** Resolves with a release function once the caller holds the key. */
  acquire(key: string): Promise<() => void>;
  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T>;
}
