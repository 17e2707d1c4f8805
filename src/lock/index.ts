export { withFileLock, readLockInfo, LockError } from "./file-lock.js";
export type { FileLockOptions, LockInfo } from "./file-lock.js";
