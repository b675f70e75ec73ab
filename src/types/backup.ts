/**
 * Backup operation type definitions
 */

export type BackupKind = "full" | "incremental";

export interface BackupDescriptor {
  path: string;
  name: string;
  kind: BackupKind;
  createdAt: Date;
  sizeBytes: number;
  modifiedAt: Date;
}

export interface BackupOptions {
  full: boolean;
}

export interface BackupResult {
  archivePath: string;
  archiveName: string;
  kind: BackupKind;
  sizeBytes: number;
  entriesCount: number;
  durationMs: number;
}

export interface ProcessResult {
  exitCode: number;
  stdout: Uint8Array;
  stderr: string;
}

export interface RunOptions {
  env?: Record<string, string>;
  cwd?: string;
}

/**
 * Runs external programs without a shell. Rejects only when the program
 * cannot be started; a non-zero exit resolves with its code.
 */
export interface ProcessRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<ProcessResult>;
}
