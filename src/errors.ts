export enum InstallerErrorCode {
  PRIVILEGE = "PRIVILEGE",
  MISSING_DEPENDENCY = "MISSING_DEPENDENCY",
  UNSUPPORTED_PLATFORM = "UNSUPPORTED_PLATFORM",
  NETWORK = "NETWORK",
  IO = "IO",
  NO_BIN_DIR = "NO_BIN_DIR",
  NO_SHARE_DIR = "NO_SHARE_DIR",
  INVALID_CONFIG = "INVALID_CONFIG",
}

const DEFAULT_EXIT_CODES: Record<InstallerErrorCode, number> = {
  [InstallerErrorCode.PRIVILEGE]: 1,
  [InstallerErrorCode.MISSING_DEPENDENCY]: 2,
  [InstallerErrorCode.UNSUPPORTED_PLATFORM]: 4,
  [InstallerErrorCode.NETWORK]: 1,
  [InstallerErrorCode.IO]: 1,
  [InstallerErrorCode.NO_BIN_DIR]: 5,
  [InstallerErrorCode.NO_SHARE_DIR]: 6,
  [InstallerErrorCode.INVALID_CONFIG]: 7,
};

export class InstallerError extends Error {
  readonly code: InstallerErrorCode;
  readonly exitCode: number;
  readonly context?: Record<string, unknown>;

  constructor(
    code: InstallerErrorCode,
    message: string,
    opts?: { exitCode?: number; context?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "InstallerError";
    this.code = code;
    this.exitCode = opts?.exitCode ?? DEFAULT_EXIT_CODES[code];
    this.context = opts?.context;
  }
}

/** Insufficient rights and no way to escalate. macOS root runs exit 1, Linux without sudo exits 3. */
export class PrivilegeError extends InstallerError {
  constructor(message: string, exitCode: number) {
    super(InstallerErrorCode.PRIVILEGE, message, { exitCode });
    this.name = "PrivilegeError";
  }
}

export class MissingDependencyError extends InstallerError {
  readonly remediation: string;

  constructor(dependency: string, remediation: string) {
    super(
      InstallerErrorCode.MISSING_DEPENDENCY,
      `${dependency} is required to complete installation. ${remediation}`,
      { context: { dependency } },
    );
    this.name = "MissingDependencyError";
    this.remediation = remediation;
  }
}

export class UnsupportedPlatformError extends InstallerError {
  constructor(osName: string) {
    super(
      InstallerErrorCode.UNSUPPORTED_PLATFORM,
      `Unsupported platform: ${osName}. This installer runs on Linux and macOS only.`,
      { context: { osName } },
    );
    this.name = "UnsupportedPlatformError";
  }
}

export class FetchError extends InstallerError {
  constructor(
    code: InstallerErrorCode.NETWORK | InstallerErrorCode.IO,
    message: string,
    opts?: { context?: Record<string, unknown>; cause?: unknown },
  ) {
    super(code, message, opts);
    this.name = "FetchError";
  }
}

export class InstallError extends InstallerError {
  constructor(
    code: InstallerErrorCode.NO_BIN_DIR | InstallerErrorCode.NO_SHARE_DIR | InstallerErrorCode.IO,
    message: string,
    opts?: { context?: Record<string, unknown>; cause?: unknown },
  ) {
    super(code, message, opts);
    this.name = "InstallError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
