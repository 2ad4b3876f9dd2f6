/**
 * Error definitions for cfgtree
 * Provides the structured error hierarchy for loading, querying and saving
 * configuration files
 */

/** Base error class for all cfgtree errors */
export class CfgtreeError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'CfgtreeError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CfgtreeError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when accessor options are invalid */
export class ConfigError extends CfgtreeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when no registered backend matches a filename or id */
export class NoMatchingBackendError extends CfgtreeError {
  constructor(target: string, context: Record<string, unknown> = {}) {
    super(`No format backend could be found to handle '${target}'`, 'NO_MATCHING_BACKEND', {
      target,
      ...context,
    })
    this.name = 'NoMatchingBackendError'
  }
}

/** Error thrown when a config file does not exist or cannot be read */
export class ConfigFileNotFoundError extends CfgtreeError {
  constructor(filePath: string, cause?: unknown) {
    super(`Config file does not exist or is not readable: ${filePath}`, 'CONFIG_FILE_NOT_FOUND', {
      filePath,
    }, { cause })
    this.name = 'ConfigFileNotFoundError'
  }
}

/** Error thrown when file content is not valid syntax for its format */
export class ConfigDecodeError extends CfgtreeError {
  /**
   * @param cause - codec error, whose message becomes the detail
   * @param reason - detail used when the document parsed but holds unsupported values
   */
  constructor(filePath: string, format: string, cause?: unknown, reason?: string) {
    const detail =
      reason !== undefined ? `: ${reason}` : cause instanceof Error ? `: ${cause.message}` : ''
    super(`Failed to decode ${format} config file at ${filePath}${detail}`, 'CONFIG_DECODE_ERROR', {
      filePath,
      format,
    }, { cause })
    this.name = 'ConfigDecodeError'
  }
}

/** Error thrown when a decoded config file is not rooted at a mapping */
export class InvalidConfigRootError extends CfgtreeError {
  constructor(filePath: string, actualType: string) {
    super(
      `Config file at ${filePath} must contain a mapping at its root, found ${actualType}`,
      'INVALID_CONFIG_ROOT',
      { filePath, actualType }
    )
    this.name = 'InvalidConfigRootError'
  }
}

/** Error thrown when a required value is absent from the config */
export class RequiredValueMissingError extends CfgtreeError {
  constructor(query: string, filePath: string) {
    super(`Required value '${query}' not found in config.`, 'REQUIRED_VALUE_MISSING', {
      query,
      filePath,
    })
    this.name = 'RequiredValueMissingError'
  }
}

/** Error thrown when a mutation or save is not permitted by the access mode */
export class ReadOnlyViolationError extends CfgtreeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'READ_ONLY_VIOLATION', context)
    this.name = 'ReadOnlyViolationError'
  }
}

/** Error thrown when save() is called before any successful load */
export class NoFormatSetError extends CfgtreeError {
  constructor(filePath: string) {
    super(`No format set for '${filePath}', cannot save.`, 'NO_FORMAT_SET', { filePath })
    this.name = 'NoFormatSetError'
  }
}

/** Error thrown when serialized content cannot be written to disk */
export class FileWriteError extends CfgtreeError {
  constructor(filePath: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : ''
    super(`Couldn't save to '${filePath}'${detail}`, 'FILE_WRITE_ERROR', { filePath }, { cause })
    this.name = 'FileWriteError'
  }
}
