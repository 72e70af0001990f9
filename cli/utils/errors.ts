/**
 * CLI Error Handling Utilities
 *
 * Error type hierarchy and exit codes for the relay commands. Every error
 * carries a machine-readable code and optional details, such as the raw
 * response body of a failed call, printed below the message.
 *
 * Error Categories:
 * - CLIError: Base class for all errors surfaced to the operator
 * - NetworkError: Transient failures (non-success HTTP status, unreachable host)
 * - InvariantError: Protocol or logic violations; only an undecodable
 *   history page is retried
 * - SubmissionError: A remote service refused a whole batch
 * - ImportAbortedError: History import gave up after repeated failures
 * - ValidationError: Invalid input (timestamps, play log lines, arguments)
 * - ConfigError: Invalid configuration values
 *
 * Exit Codes:
 * - 0: Success
 * - 1: Usage error or fatal abort
 */

// ============================================================================
// Exit Codes
// ============================================================================

export const ExitCode = {
  SUCCESS: 0,
  ERROR: 1,
} as const

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode]

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCode = {
  // General
  UNKNOWN: 'unknown_error',

  // Validation
  INVALID_ARGUMENT: 'invalid_argument',
  INVALID_FORMAT: 'invalid_format',

  // Network
  NETWORK_ERROR: 'network_error',
  HTTP_ERROR: 'http_error',
  API_ERROR: 'api_error',

  // Invariants
  ACCEPTED_COUNT_MISMATCH: 'accepted_count_mismatch',
  ITEM_TOO_LARGE: 'item_too_large',
  MALFORMED_RESPONSE: 'malformed_response',

  // Submission / import
  SUBMISSION_REJECTED: 'submission_rejected',
  IMPORT_ABORTED: 'import_aborted',

  // Configuration
  CONFIG_INVALID: 'config_invalid',
} as const

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode]

// ============================================================================
// Base CLI Error
// ============================================================================

export interface CLIErrorOptions {
  code?: ErrorCodeValue
  exitCode?: ExitCodeValue
  details?: Record<string, unknown>
  hint?: string
  cause?: Error
}

/**
 * Base class for all CLI errors.
 *
 * Carries a machine-readable code, the exit code for process termination,
 * and optional details (such as a raw response body) and a hint.
 */
export class CLIError extends Error {
  readonly code: ErrorCodeValue
  readonly exitCode: ExitCodeValue
  readonly details?: Record<string, unknown>
  readonly hint?: string

  constructor(message: string, options: CLIErrorOptions = {}) {
    super(message)
    this.name = 'CLIError'
    this.code = options.code ?? ErrorCode.UNKNOWN
    this.exitCode = options.exitCode ?? ExitCode.ERROR
    this.details = options.details
    this.hint = options.hint
    if (options.cause) {
      this.cause = options.cause
    }
  }

  /**
   * Format error for human-readable CLI output
   */
  format(useColors = true): string {
    const red = useColors ? '\x1b[31m' : ''
    const dim = useColors ? '\x1b[2m' : ''
    const reset = useColors ? '\x1b[0m' : ''

    let output = `${red}Error:${reset} ${this.message}`

    if (this.hint) {
      output += `\n${dim}Hint: ${this.hint}${reset}`
    }

    if (this.details && Object.keys(this.details).length > 0) {
      const detailsStr = Object.entries(this.details)
        .map(([k, v]) => `  ${k}: ${typeof v === 'string' ? v : JSON.stringify(v)}`)
        .join('\n')
      output += `\n${dim}Details:\n${detailsStr}${reset}`
    }

    return output
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export interface ValidationErrorOptions extends CLIErrorOptions {
  argument?: string
  expected?: string
  received?: string
}

/**
 * Error for invalid input.
 */
export class ValidationError extends CLIError {
  constructor(message: string, options: ValidationErrorOptions = {}) {
    super(message, {
      code: options.code ?? ErrorCode.INVALID_ARGUMENT,
      exitCode: options.exitCode,
      details: {
        ...(options.argument && { argument: options.argument }),
        ...(options.expected && { expected: options.expected }),
        ...(options.received && { received: options.received }),
        ...options.details,
      },
      hint: options.hint,
      cause: options.cause,
    })
    this.name = 'ValidationError'
  }

  static invalidArgument(name: string, expected: string, received?: string): ValidationError {
    return new ValidationError(`Invalid argument: ${name}`, {
      code: ErrorCode.INVALID_ARGUMENT,
      argument: name,
      expected,
      received,
      hint: `Expected: ${expected}`,
    })
  }

  static invalidFormat(field: string, expected: string, received?: string): ValidationError {
    return new ValidationError(`Invalid format for ${field}`, {
      code: ErrorCode.INVALID_FORMAT,
      argument: field,
      expected,
      received,
    })
  }
}

// ============================================================================
// Network Errors
// ============================================================================

export interface NetworkErrorOptions extends CLIErrorOptions {
  url?: string
  statusCode?: number
  body?: string
}

/**
 * Transient failure talking to a remote service.
 *
 * Callers retry these (history import) or stop the run without marking
 * anything, leaving the listens eligible for the next run.
 */
export class NetworkError extends CLIError {
  readonly url?: string
  readonly statusCode?: number

  constructor(message: string, options: NetworkErrorOptions = {}) {
    super(message, {
      code: options.code ?? ErrorCode.NETWORK_ERROR,
      exitCode: options.exitCode,
      details: {
        ...(options.url && { url: options.url }),
        ...(options.statusCode !== undefined && { statusCode: options.statusCode }),
        ...(options.body !== undefined && { response: options.body }),
        ...options.details,
      },
      hint: options.hint,
      cause: options.cause,
    })
    this.name = 'NetworkError'
    this.url = options.url
    this.statusCode = options.statusCode
  }

  static httpError(status: number, url: string, body: string): NetworkError {
    return new NetworkError(`Unexpected response, status ${status}.`, {
      code: ErrorCode.HTTP_ERROR,
      url,
      statusCode: status,
      body,
    })
  }

  static apiError(code: number, message: string, url: string): NetworkError {
    return new NetworkError(`Service error ${code}: ${message}`, {
      code: ErrorCode.API_ERROR,
      url,
      details: { apiErrorCode: code },
    })
  }

  static connectionFailed(url: string, cause?: Error): NetworkError {
    return new NetworkError(`Failed to connect to ${url}`, {
      code: ErrorCode.NETWORK_ERROR,
      url,
      cause,
    })
  }
}

// ============================================================================
// Invariant Errors
// ============================================================================

/**
 * A protocol or logic violation. Submission runs abort on it and mark
 * nothing from the offending batch; the history import retries a page whose
 * body could not be decoded (`malformed_response`).
 */
export class InvariantError extends CLIError {
  constructor(message: string, options: CLIErrorOptions = {}) {
    super(message, {
      code: options.code ?? ErrorCode.MALFORMED_RESPONSE,
      exitCode: options.exitCode,
      details: options.details,
      hint: options.hint,
      cause: options.cause,
    })
    this.name = 'InvariantError'
  }

  static acceptedCountMismatch(expected: number, actual: number, response: string): InvariantError {
    return new InvariantError(
      `Service reported ${expected} accepted scrobbles, but ${actual} items were accepted individually.`,
      {
        code: ErrorCode.ACCEPTED_COUNT_MISMATCH,
        details: { expected, actual, response },
      },
    )
  }

  static itemTooLarge(maxBytes: number, actualBytes: number): InvariantError {
    return new InvariantError('A listen is too big to submit.', {
      code: ErrorCode.ITEM_TOO_LARGE,
      details: { maxBytes, actualBytes },
    })
  }

  static malformedResponse(message: string, response: string, cause?: Error): InvariantError {
    return new InvariantError(`Unexpected response shape: ${message}`, {
      code: ErrorCode.MALFORMED_RESPONSE,
      details: { response },
      cause,
    })
  }
}

// ============================================================================
// Submission Errors
// ============================================================================

/**
 * The service refused a whole batch. Fatal for the run.
 */
export class SubmissionError extends CLIError {
  readonly statusCode: number

  constructor(statusCode: number, body: string) {
    super(`Unexpected response, status ${statusCode}.`, {
      code: ErrorCode.SUBMISSION_REJECTED,
      details: { statusCode, response: body },
    })
    this.name = 'SubmissionError'
    this.statusCode = statusCode
  }
}

// ============================================================================
// Import Errors
// ============================================================================

export class ImportAbortedError extends CLIError {
  readonly page: number
  readonly failures: number

  constructor(page: number, failures: number, cause?: Error) {
    super(`History import aborted after ${failures} consecutive failures on page ${page}.`, {
      code: ErrorCode.IMPORT_ABORTED,
      details: {
        page,
        failures,
        ...(cause instanceof CLIError && cause.details),
      },
      cause,
    })
    this.name = 'ImportAbortedError'
    this.page = page
    this.failures = failures
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export interface ConfigErrorOptions extends CLIErrorOptions {
  key?: string
}

/**
 * Error for configuration values that cannot be used at all.
 */
export class ConfigError extends CLIError {
  constructor(message: string, options: ConfigErrorOptions = {}) {
    super(message, {
      code: options.code ?? ErrorCode.CONFIG_INVALID,
      exitCode: options.exitCode,
      details: {
        ...(options.key && { key: options.key }),
        ...options.details,
      },
      hint: options.hint,
      cause: options.cause,
    })
    this.name = 'ConfigError'
  }

  static invalidValue(key: string, expected: string): ConfigError {
    return new ConfigError(`Invalid value for ${key}`, {
      key,
      hint: `Expected: ${expected}`,
    })
  }
}

// ============================================================================
// Error Handling Utilities
// ============================================================================

export interface HandleErrorOptions {
  /** Use colors in output (default: when stderr is a TTY) */
  colors?: boolean
}

/**
 * Report an error to stderr and terminate with its exit code.
 */
export function handleError(error: unknown, options: HandleErrorOptions = {}): void {
  const { colors = process.stderr.isTTY ?? false } = options
  const cliError = toCLIError(error)

  console.error(cliError.format(colors))
  process.exit(cliError.exitCode)
}

/**
 * Wrap any thrown value in a CLIError
 */
export function toCLIError(error: unknown): CLIError {
  if (error instanceof CLIError) {
    return error
  }
  if (error instanceof Error) {
    return new CLIError(error.message, { cause: error })
  }
  return new CLIError(String(error))
}

/**
 * Short one-line description of any thrown value
 */
export function summarizeError(error: unknown): string {
  if (error instanceof CLIError) {
    return `${error.name} [${error.code}]: ${error.message}`
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`
  }
  return String(error)
}
