export interface InstanceLockPort {
  /** False when another process already holds the lock. */
  acquire: () => Promise<boolean>;
  release: () => Promise<void>;
}
