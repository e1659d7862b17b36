export interface ScanOptions {
  /** Resolve entry metadata through symbolic links and descend into linked directories. */
  followLinks: boolean;
  /** Stay on the device the scan root lives on. */
  oneFileSystem: boolean;
}

export interface WalkEntry {
  path: string;
  /** Byte length for regular files, 0 for everything else. */
  size: number;
  isDirectory: boolean;
  modifiedTime?: Date;
  /** Device id from the entry's metadata, when known. */
  device?: number;
}

export interface WalkError {
  path: string;
  code?: string;
  message: string;
}

export type WalkResult = { status: 'ok'; data: WalkEntry } | { status: 'error'; error: WalkError };

/**
 * Enumerates every descendant of a root path.
 * `walk` resolves only once the whole subtree has been visited; result order is unspecified.
 */
export interface EntrySource {
  walk(rootPath: string, options: ScanOptions): Promise<WalkResult[]>;
  statRoot(rootPath: string): Promise<WalkResult>;
}
