export class BenchError extends Error {
  code: string;
  exitCode: number;

  constructor(message: string, code: string, exitCode: number = 1) {
    super(message);
    this.name = 'BenchError';
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class ConfigError extends BenchError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIG', 2);
    this.name = 'ConfigError';
  }
}

export class TargetUnreachableError extends BenchError {
  url: string;

  constructor(url: string, reason: string) {
    super(`Target ${url} is unreachable: ${reason}`, 'TARGET_UNREACHABLE', 3);
    this.name = 'TargetUnreachableError';
    this.url = url;
  }
}

export class ReportIOError extends BenchError {
  path: string;

  constructor(message: string, path: string) {
    super(message, 'REPORT_IO', 4);
    this.name = 'ReportIOError';
    this.path = path;
  }
}

export function exitCodeFor(error: unknown): number {
  return error instanceof BenchError ? error.exitCode : 1;
}
