/**
 * Opaque engine version identifier (release tag, build hash...). Compared by exact string equality.
 */
export type EngineVersion = string;

export interface ManifestEntry {
  version: EngineVersion;
  downloadUrl: string;
  expectedSignature: string;
}

export interface EngineInstallation {
  version: EngineVersion;
  installPath: string;
  packagePath: string;
  signature: string;
  installedAt: number;
  lastUsedAt: number;
  sizeBytes: number;
}

/**
 * Contents of the install.json sidecar kept in every version directory
 */
export interface InstallRecord {
  formatVersion: 1;
  version: EngineVersion;
  signature: string;
  packageFile: string;
  installedAt: string;
  lastUsedAt: string;
  sizeBytes: number;
}

export interface CullPolicy {
  /** Unpinned installations kept at most; undefined disables the limit */
  maxInstallations?: number;
  /** Installations unused for longer than this are removed; undefined disables the limit */
  maxAgeMs?: number;
}

export type DownloadProgressCallback = (bytesSoFar: number, totalBytes?: number) => void;

export type InstallState = 'absent' | 'resolving' | 'downloading' | 'verifying' | 'installed' | 'failed';

export type DownloadResult =
  | { status: 'ok'; bytesWritten: number }
  | { status: 'cancelled' };

export type VerifyResult =
  | { status: 'ok'; signature: string }
  | { status: 'corrupt'; expected: string; actual: string };
