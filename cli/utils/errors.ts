/**
 * CLI Error Handling Utilities
 *
 * Provides a unified error type hierarchy, standardized exit codes,
 * and structured error output for the benchmark harness.
 *
 * Error Categories:
 * - CLIError: Base class for all CLI errors
 * - ValidationError: Invalid options or configuration
 * - PreconditionError: Required paths missing before benchmarking
 * - ExternalProcessError: The workload client failed or could not start
 * - MalformedOutputError: Client output lacks the expected markers
 * - CleanupError: Target directory could not be emptied between cells
 * - MissingResultError: A report cell lacks one backend's figure
 *
 * Exit Codes:
 * - 0: Success
 * - 1: General error
 * - 2: Misuse (invalid arguments/options)
 * - 3: Precondition failed
 * - 4: External client failed
 * - 5: Malformed client output
 * - 6: Directory cleanup failed
 * - 7: Missing result entry
 */

// ============================================================================
// Exit Codes
// ============================================================================

export const ExitCode = {
  SUCCESS: 0,
  ERROR: 1,
  MISUSE: 2,
  PRECONDITION_FAILED: 3,
  CLIENT_FAILED: 4,
  MALFORMED_OUTPUT: 5,
  CLEANUP_FAILED: 6,
  MISSING_RESULT: 7,
} as const

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode]

// ============================================================================
// Error Codes (for structured output)
// ============================================================================

export const ErrorCode = {
  // General
  UNKNOWN: 'unknown_error',

  // Validation
  INVALID_ARGUMENT: 'invalid_argument',
  INVALID_OPTION: 'invalid_option',
  CONFIG_INVALID: 'config_invalid',

  // Preconditions
  PATH_NOT_FOUND: 'path_not_found',
  NOT_A_DIRECTORY: 'not_a_directory',

  // External process
  COMMAND_FAILED: 'command_failed',
  SPAWN_ERROR: 'spawn_error',

  // Output parsing
  MARKER_NOT_FOUND: 'marker_not_found',
  INVALID_NUMBER: 'invalid_number',

  // Filesystem
  CLEANUP_FAILED: 'cleanup_failed',

  // Reporting
  MISSING_RESULT: 'missing_result',
} as const

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode]

// ============================================================================
// Structured Error Output
// ============================================================================

export interface StructuredError {
  error: {
    code: ErrorCodeValue
    message: string
    exitCode: ExitCodeValue
    details?: Record<string, unknown>
    hint?: string
    cause?: string
  }
}

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
 * Provides structured error information including:
 * - Machine-readable error code
 * - Exit code for process termination
 * - Optional details and hints for resolution
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
   * Convert to structured JSON format for machine consumption
   */
  toJSON(): StructuredError {
    return {
      error: {
        code: this.code,
        message: this.message,
        exitCode: this.exitCode,
        ...(this.details && { details: this.details }),
        ...(this.hint && { hint: this.hint }),
        ...(this.cause instanceof Error && { cause: this.cause.message }),
      },
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
 * Error for invalid input or configuration.
 */
export class ValidationError extends CLIError {
  constructor(message: string, options: ValidationErrorOptions = {}) {
    super(message, {
      code: options.code ?? ErrorCode.INVALID_ARGUMENT,
      exitCode: options.exitCode ?? ExitCode.MISUSE,
      details: {
        ...(options.argument && { argument: options.argument }),
        ...(options.expected && { expected: options.expected }),
        ...(options.received !== undefined && { received: options.received }),
        ...options.details,
      },
      hint: options.hint,
      cause: options.cause,
    })
    this.name = 'ValidationError'
  }

  static invalidOption(name: string, expected: string, received?: string): ValidationError {
    return new ValidationError(`Invalid option: ${name}`, {
      code: ErrorCode.INVALID_OPTION,
      argument: name,
      expected,
      received,
      hint: `Expected: ${expected}`,
    })
  }

  static invalidConfig(issues: Array<{ field: string; message: string }>): ValidationError {
    return new ValidationError('Invalid benchmark configuration', {
      code: ErrorCode.CONFIG_INVALID,
      details: {
        issues: issues.map((issue) => (issue.field ? `${issue.field}: ${issue.message}` : issue.message)),
      },
    })
  }
}

// ============================================================================
// Precondition Errors
// ============================================================================

export interface PreconditionErrorOptions extends CLIErrorOptions {
  path?: string
}

/**
 * Error for a required path that is absent before benchmarking starts.
 */
export class PreconditionError extends CLIError {
  readonly path?: string

  constructor(message: string, options: PreconditionErrorOptions = {}) {
    super(message, {
      code: options.code ?? ErrorCode.PATH_NOT_FOUND,
      exitCode: options.exitCode ?? ExitCode.PRECONDITION_FAILED,
      details: {
        ...(options.path && { path: options.path }),
        ...options.details,
      },
      hint: options.hint,
      cause: options.cause,
    })
    this.name = 'PreconditionError'
    this.path = options.path
  }

  static pathNotFound(what: string, path: string): PreconditionError {
    return new PreconditionError(`${what} not found: ${path}`, {
      code: ErrorCode.PATH_NOT_FOUND,
      path,
    })
  }

  static notADirectory(what: string, path: string): PreconditionError {
    return new PreconditionError(`${what} is not a directory: ${path}`, {
      code: ErrorCode.NOT_A_DIRECTORY,
      path,
    })
  }
}

// ============================================================================
// External Process Errors
// ============================================================================

export interface ExternalProcessErrorOptions extends CLIErrorOptions {
  command?: string
  args?: string[]
  processExitCode?: number | null
  signal?: string | null
  stdout?: string
  stderr?: string
}

/**
 * Error for a workload client that exited non-zero or could not be spawned.
 * Carries both captured streams so the failure can be diagnosed without a rerun.
 */
export class ExternalProcessError extends CLIError {
  readonly command?: string
  readonly args?: string[]
  readonly processExitCode: number | null
  readonly signal: string | null
  readonly stdout: string
  readonly stderr: string

  constructor(message: string, options: ExternalProcessErrorOptions = {}) {
    super(message, {
      code: options.code ?? ErrorCode.COMMAND_FAILED,
      exitCode: options.exitCode ?? ExitCode.CLIENT_FAILED,
      details: {
        ...(options.command && { command: options.command }),
        ...(options.args && { args: options.args }),
        ...options.details,
      },
      hint: options.hint,
      cause: options.cause,
    })
    this.name = 'ExternalProcessError'
    this.command = options.command
    this.args = options.args
    this.processExitCode = options.processExitCode ?? null
    this.signal = options.signal ?? null
    this.stdout = options.stdout ?? ''
    this.stderr = options.stderr ?? ''
  }

  static failed(
    command: string,
    args: string[],
    result: { code: number | null; signal: string | null; stdout: string; stderr: string }
  ): ExternalProcessError {
    const reason = result.code !== null ? `exit code ${result.code}` : `signal ${result.signal ?? 'unknown'}`
    return new ExternalProcessError(`Command failed with ${reason}: ${command}`, {
      code: ErrorCode.COMMAND_FAILED,
      command,
      args,
      processExitCode: result.code,
      signal: result.signal,
      stdout: result.stdout,
      stderr: result.stderr,
    })
  }

  static spawnFailed(command: string, cause?: Error): ExternalProcessError {
    return new ExternalProcessError(`Failed to spawn command: ${command}`, {
      code: ErrorCode.SPAWN_ERROR,
      command,
      cause,
    })
  }

  override format(useColors = true): string {
    const lines = [super.format(useColors)]
    if (this.processExitCode !== null) {
      lines.push(`\nexit code: ${this.processExitCode}`)
    } else if (this.signal !== null) {
      lines.push(`\nsignal: ${this.signal}`)
    }
    lines.push(`\nstdout:\n${this.stdout}`)
    lines.push(`\nstderr:\n${this.stderr}`)
    return lines.join('\n')
  }
}

// ============================================================================
// Malformed Output Errors
// ============================================================================

export interface MalformedOutputErrorOptions extends CLIErrorOptions {
  output?: string
}

/**
 * Error for client output that does not carry a parseable measurement.
 */
export class MalformedOutputError extends CLIError {
  readonly output: string

  constructor(message: string, options: MalformedOutputErrorOptions = {}) {
    super(message, {
      code: options.code ?? ErrorCode.MARKER_NOT_FOUND,
      exitCode: options.exitCode ?? ExitCode.MALFORMED_OUTPUT,
      details: options.details,
      hint: options.hint ?? 'The client output format may have changed.',
      cause: options.cause,
    })
    this.name = 'MalformedOutputError'
    this.output = options.output ?? ''
  }

  static markerNotFound(marker: string, output: string): MalformedOutputError {
    return new MalformedOutputError(`Marker not found in client output: ${JSON.stringify(marker)}`, {
      code: ErrorCode.MARKER_NOT_FOUND,
      details: { marker },
      output,
    })
  }

  static invalidNumber(field: string, received: string, output: string): MalformedOutputError {
    return new MalformedOutputError(`Invalid ${field} in client output: ${JSON.stringify(received)}`, {
      code: ErrorCode.INVALID_NUMBER,
      details: { field, received },
      output,
    })
  }

  override format(useColors = true): string {
    return `${super.format(useColors)}\n\noutput:\n${this.output}`
  }
}

// ============================================================================
// Cleanup Errors
// ============================================================================

/**
 * Error for a target directory entry that could not be removed.
 */
export class CleanupError extends CLIError {
  readonly path: string

  constructor(path: string, cause?: Error) {
    super(`Failed to remove ${path}`, {
      code: ErrorCode.CLEANUP_FAILED,
      exitCode: ExitCode.CLEANUP_FAILED,
      details: { path },
      cause,
    })
    this.name = 'CleanupError'
    this.path = path
  }
}

// ============================================================================
// Missing Result Errors
// ============================================================================

/**
 * Error for a report cell that lacks one backend's throughput.
 */
export class MissingResultError extends CLIError {
  constructor(valueSize: number, workload: string, backend: string) {
    super(`No result for backend ${backend} at value size ${valueSize}, workload ${workload}`, {
      code: ErrorCode.MISSING_RESULT,
      exitCode: ExitCode.MISSING_RESULT,
      details: { valueSize, workload, backend },
    })
    this.name = 'MissingResultError'
  }
}

// ============================================================================
// Error Handler
// ============================================================================

export interface HandleErrorOptions {
  /** Output JSON instead of human-readable format */
  json?: boolean
  /** Whether to exit the process (default: true) */
  exit?: boolean
  /** Logger function (default: console.error) */
  log?: (message: string) => void
  /** Enable colored output (default: auto-detect) */
  colors?: boolean
}

/**
 * Handle an error with consistent output and exit behavior.
 *
 * ```typescript
 * try {
 *   await runExperiment(config)
 * } catch (error) {
 *   handleError(error)
 * }
 * ```
 */
export function handleError(error: unknown, options: HandleErrorOptions = {}): void {
  const { json = false, exit = true, log = console.error, colors = process.stderr.isTTY ?? false } = options

  const cliError = toCLIError(error)

  if (json) {
    log(JSON.stringify(cliError.toJSON(), null, 2))
  } else {
    log(cliError.format(colors))
  }

  if (exit) {
    process.exit(cliError.exitCode)
  }
}

/**
 * Wrap an async function with error handling.
 * `options` may be computed from the call's arguments.
 *
 * ```typescript
 * command.action(withErrorHandling(async (dbDir, library, options) => {
 *   // Your command logic here
 * }))
 * ```
 */
export function withErrorHandling<T extends unknown[], R>(
  fn: (...args: T) => Promise<R>,
  options?: HandleErrorOptions | ((...args: T) => HandleErrorOptions)
): (...args: T) => Promise<R | void> {
  return async (...args: T) => {
    try {
      return await fn(...args)
    } catch (error) {
      handleError(error, typeof options === 'function' ? options(...args) : options)
    }
  }
}

/**
 * Convert any error to a CLIError.
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
