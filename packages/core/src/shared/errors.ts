export class SessionDistillError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'SessionDistillError';
  }
}

/** No event source could be found or nothing could be parsed from it. */
export class GroupingError extends SessionDistillError {
  constructor(message: string) {
    super(message, 'GROUPING_ERROR');
    this.name = 'GroupingError';
  }
}

export class DistillationError extends SessionDistillError {
  constructor(message: string) {
    super(message, 'DISTILLATION_ERROR');
    this.name = 'DistillationError';
  }
}

export class ExtractionError extends SessionDistillError {
  constructor(message: string) {
    super(message, 'EXTRACTION_ERROR');
    this.name = 'ExtractionError';
  }
}

export class UploadError extends SessionDistillError {
  constructor(message: string, public readonly status?: number) {
    super(message, 'UPLOAD_ERROR');
    this.name = 'UploadError';
  }
}

export class ConfigError extends SessionDistillError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class PackageError extends SessionDistillError {
  constructor(message: string) {
    super(message, 'PACKAGE_ERROR');
    this.name = 'PackageError';
  }
}
