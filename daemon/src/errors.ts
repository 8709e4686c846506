export class CorebarError extends Error {
  constructor(message: string, public code: string, public statusCode: number) {
    super(message);
    this.name = 'CorebarError';
  }
}

// Control API

export class TransportError extends CorebarError {
  constructor(public endpoint: string, message: string) {
    super(message, 'TRANSPORT_ERROR', 502);
    this.name = 'TransportError';
  }
}

export class ApiError extends CorebarError {
  constructor(public status: number, public endpoint: string) {
    super(`Control API responded ${status} for ${endpoint}`, 'API_ERROR', 502);
    this.name = 'ApiError';
  }
}

export class DecodeError extends CorebarError {
  constructor(public endpoint: string, detail: string) {
    super(`Unexpected response from ${endpoint}: ${detail}`, 'DECODE_ERROR', 502);
    this.name = 'DecodeError';
  }
}

// Process lifecycle

export class ProcessLifecycleError extends CorebarError {
  constructor(message: string, code: string, statusCode: number) {
    super(message, code, statusCode);
    this.name = 'ProcessLifecycleError';
  }
}

export class ExecutableMissingError extends ProcessLifecycleError {
  constructor(public binaryPath: string) {
    super(`Proxy core executable not found: ${binaryPath}`, 'EXECUTABLE_MISSING', 500);
    this.name = 'ExecutableMissingError';
  }
}

export class AlreadyRunningError extends ProcessLifecycleError {
  constructor(public state: string) {
    super(`Proxy core is not stopped (current: ${state})`, 'ALREADY_RUNNING', 409);
    this.name = 'AlreadyRunningError';
  }
}

export class StartupTimeoutError extends ProcessLifecycleError {
  constructor(public timeoutMs: number) {
    super(`Control API not ready after ${timeoutMs}ms`, 'STARTUP_TIMEOUT', 504);
    this.name = 'StartupTimeoutError';
  }
}

export class ProcessExitedError extends ProcessLifecycleError {
  constructor(public exitCode: number | null, public signal: string | null = null) {
    super(`Proxy core exited during startup (code: ${exitCode ?? 'none'}, signal: ${signal ?? 'none'})`, 'PROCESS_EXITED', 500);
    this.name = 'ProcessExitedError';
  }
}

export class OperationInProgressError extends ProcessLifecycleError {
  constructor(public operation: string) {
    super(`Another lifecycle operation is in progress (${operation})`, 'OPERATION_IN_PROGRESS', 409);
    this.name = 'OperationInProgressError';
  }
}

// Profiles & nodes

export class ConfigNotFoundError extends CorebarError {
  constructor(message = 'No active configuration profile') {
    super(message, 'CONFIG_NOT_FOUND', 404);
    this.name = 'ConfigNotFoundError';
  }
}

export class ProfileNotFoundError extends CorebarError {
  constructor(public profileId: string) {
    super(`Profile not found: ${profileId}`, 'PROFILE_NOT_FOUND', 404);
    this.name = 'ProfileNotFoundError';
  }
}

export class InvalidProfileError extends CorebarError {
  constructor(message: string) {
    super(message, 'INVALID_PROFILE', 400);
    this.name = 'InvalidProfileError';
  }
}

export class NodeNotFoundError extends CorebarError {
  constructor(public nodeName: string) {
    super(`Node not found: ${nodeName}`, 'NODE_NOT_FOUND', 404);
    this.name = 'NodeNotFoundError';
  }
}

export class NodeNotInAnyGroupError extends CorebarError {
  constructor(public nodeName: string) {
    super(`No proxy group contains node ${nodeName}`, 'NODE_NOT_IN_ANY_GROUP', 409);
    this.name = 'NodeNotInAnyGroupError';
  }
}

export class SystemProxyError extends CorebarError {
  constructor(message: string) {
    super(message, 'SYSTEM_PROXY_ERROR', 500);
    this.name = 'SystemProxyError';
  }
}

export class ValidationError extends CorebarError {
  constructor(message: string, public details: string[] = []) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
