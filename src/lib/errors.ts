/**
 * Tapekeeper Error Hierarchy
 *
 * Typed error classes shared by the CLI and the domain layer.
 *
 * Hierarchy:
 *   TapekeeperError (base)
 *   ├── ConfigError (configuration issues, fatal)
 *   │   ├── ConfigNotFoundError
 *   │   ├── InvalidConfigError
 *   │   └── MissingConfigKeyError
 *   ├── CredentialError (credential file issues, fatal)
 *   ├── ClassificationError (a single record could not be classified)
 *   │   ├── UnsupportedSizeUnitError
 *   │   └── InvalidTimestampError
 *   └── RemoteCommandError (remote channel failures)
 */

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: Error
}

/**
 * Base error class for all Tapekeeper errors
 */
export class TapekeeperError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'TapekeeperError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  /**
   * Convert to JSON for logging/debugging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Base class for configuration-related errors
 */
export class ConfigError extends TapekeeperError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when the YAML parameters file does not exist
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(searchedPath: string) {
    super(`The file '${searchedPath}' does not exist.`, 'CONFIG_NOT_FOUND', {
      suggestion: 'Pass the path of the YAML parameters file as the first argument',
      context: { searchedPath }
    })
    this.name = 'ConfigNotFoundError'
  }
}

/**
 * Thrown when the parameters file cannot be parsed or a value has the wrong shape
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: Error) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check the YAML syntax and value types of the parameters file',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

/**
 * Thrown when a required parameter is absent
 */
export class MissingConfigKeyError extends ConfigError {
  constructor(key: string, configPath: string) {
    super(`'${key}' parameter is missing on ${configPath} file`, 'MISSING_CONFIG_KEY', {
      suggestion: `Add "${key}" to ${configPath}`,
      context: { key, configPath }
    })
    this.name = 'MissingConfigKeyError'
  }
}

// =============================================================================
// Credential Errors
// =============================================================================

export class CredentialError extends TapekeeperError {
  constructor(message: string, filePath: string, cause?: Error) {
    super(message, 'CREDENTIAL_ERROR', {
      suggestion: 'The credential file needs two base64 lines: username, then password',
      context: { filePath },
      cause
    })
    this.name = 'CredentialError'
  }
}

// =============================================================================
// Classification Errors
// =============================================================================

/**
 * Base class for errors raised while classifying a single record
 */
export class ClassificationError extends TapekeeperError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ClassificationError'
  }
}

/**
 * Thrown when a size string carries a unit outside the binary unit table
 */
export class UnsupportedSizeUnitError extends ClassificationError {
  constructor(unit: string, input: string) {
    super(`Unsupported unit: ${unit}`, 'UNSUPPORTED_SIZE_UNIT', {
      suggestion: 'Supported units: B, KB, MB, MiB, GB, GiB, TB, TiB',
      context: { unit, input }
    })
    this.name = 'UnsupportedSizeUnitError'
  }
}

/**
 * Thrown when an appliance timestamp does not match its expected layout
 */
export class InvalidTimestampError extends ClassificationError {
  constructor(value: string, layout: string) {
    super(`Invalid timestamp "${value}" (expected ${layout})`, 'INVALID_TIMESTAMP', {
      context: { value, layout }
    })
    this.name = 'InvalidTimestampError'
  }
}

// =============================================================================
// Remote Errors
// =============================================================================

export class RemoteCommandError extends TapekeeperError {
  constructor(host: string, command: string, reason: string, cause?: Error) {
    super(`Command failed on ${host}: ${reason}`, 'REMOTE_COMMAND_FAILED', {
      context: { host, command },
      cause
    })
    this.name = 'RemoteCommandError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isTapekeeperError(error: unknown): error is TapekeeperError {
  return error instanceof TapekeeperError
}

/**
 * Configuration and credential errors are the only fatal ones
 */
export function isConfigError(error: unknown): error is ConfigError | CredentialError {
  return error instanceof ConfigError || error instanceof CredentialError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isTapekeeperError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Extract a loggable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
