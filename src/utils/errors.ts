export class VpnConsoleError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'VpnConsoleError';
  }
}

export class ProcessSpawnError extends VpnConsoleError {
  constructor(message: string, cause?: Error) {
    super(
      `Failed to start VPN process: ${message}`,
      'PROCESS_SPAWN_ERROR',
      { cause: cause?.message }
    );
    this.name = 'ProcessSpawnError';
  }
}

export class ConnectionError extends VpnConsoleError {
  constructor(message: string, endpoint?: { host: string; port: number }, cause?: Error) {
    super(
      `Management connection failed: ${message}`,
      'CONNECTION_ERROR',
      { ...endpoint, cause: cause?.message }
    );
    this.name = 'ConnectionError';
  }
}

export class ProtocolParseError extends VpnConsoleError {
  constructor(reason: string, line: string) {
    super(
      `Malformed management message: ${reason}`,
      'PROTOCOL_PARSE_ERROR',
      { line }
    );
    this.name = 'ProtocolParseError';
  }
}

export class AlreadyConnectedError extends VpnConsoleError {
  constructor(sessionId?: string) {
    super(
      'A VPN session is already active',
      'ALREADY_CONNECTED',
      { sessionId }
    );
    this.name = 'AlreadyConnectedError';
  }
}

export class NotConnectedError extends VpnConsoleError {
  constructor(command?: string) {
    super(
      'Management channel is not connected',
      'NOT_CONNECTED',
      { command }
    );
    this.name = 'NotConnectedError';
  }
}

export class ConfigNotFoundError extends VpnConsoleError {
  constructor(name: string) {
    super(
      `Configuration '${name}' does not exist`,
      'CONFIG_NOT_FOUND',
      { name }
    );
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigImportError extends VpnConsoleError {
  constructor(sourcePath: string, reason: string) {
    super(
      `Cannot import ${sourcePath}: ${reason}`,
      'CONFIG_IMPORT_ERROR',
      { sourcePath }
    );
    this.name = 'ConfigImportError';
  }
}

export class VpnBinaryNotInstalledError extends VpnConsoleError {
  constructor(binary: string) {
    super(
      `'${binary}' was not found on PATH`,
      'BINARY_NOT_INSTALLED',
      { binary }
    );
    this.name = 'VpnBinaryNotInstalledError';
  }
}

export class StorageError extends VpnConsoleError {
  constructor(operation: string, cause?: Error) {
    super(
      `Storage operation failed: ${operation}`,
      'STORAGE_ERROR',
      { operation, cause: cause?.message }
    );
    this.name = 'StorageError';
  }
}

export class InvalidCommandParameterError extends VpnConsoleError {
  constructor(parameter: string, reason: string) {
    super(
      `Invalid ${parameter}: ${reason}`,
      'INVALID_COMMAND_PARAMETER',
      { parameter }
    );
    this.name = 'InvalidCommandParameterError';
  }
}
