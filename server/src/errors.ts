// Error taxonomy shared by the store, registry, synchronizer and dispatcher.
// Routes map `code` to an HTTP status; background loops log and recover.

export type ErrorCode =
  | 'VALIDATION'
  | 'UNKNOWN_PLUGIN'
  | 'UNKNOWN_PAGE'
  | 'NO_FREE_SLOT'
  | 'LAST_PAGE'
  | 'IO'
  | 'DEVICE_NOT_FOUND'
  | 'INVALID_BRIGHTNESS'
  | 'PLUGIN_TIMEOUT';

export interface ValidationIssue {
  path: string;
  message: string;
}

export class KeypanelError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends KeypanelError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super('VALIDATION', message);
    this.issues = issues;
  }
}

export class UnknownPluginError extends KeypanelError {
  constructor(readonly pluginId: string) {
    super('UNKNOWN_PLUGIN', `Plugin ${pluginId} not found`);
  }
}

export class UnknownPageError extends KeypanelError {
  constructor(readonly pageId: string) {
    super('UNKNOWN_PAGE', `Page ${pageId} not found`);
  }
}

export class NoFreeSlotError extends KeypanelError {
  constructor(readonly pageId: string) {
    super('NO_FREE_SLOT', `Page ${pageId} has no free slot`);
  }
}

export class LastPageError extends KeypanelError {
  constructor(readonly pageId: string) {
    super('LAST_PAGE', `Page ${pageId} is the last page and cannot be deleted`);
  }
}

export class IOError extends KeypanelError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IO', message, options);
  }
}

export class DeviceNotFoundError extends KeypanelError {
  constructor(message = 'No key panel device found') {
    super('DEVICE_NOT_FOUND', message);
  }
}

export class InvalidBrightnessError extends KeypanelError {
  constructor(readonly value: unknown) {
    super('INVALID_BRIGHTNESS', `Brightness must be an integer between 0 and 100, got ${String(value)}`);
  }
}

export class PluginTimeoutError extends KeypanelError {
  constructor(readonly pluginId: string, readonly timeoutMs: number) {
    super('PLUGIN_TIMEOUT', `Plugin ${pluginId} did not finish within ${timeoutMs}ms`);
  }
}

// Message of anything thrown, for logs and dispatch statuses
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
