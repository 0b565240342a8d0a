import { z } from 'zod';
import { createLogger, serializeError } from '../core/log';

/**
 * Standard CLI result for successful operations
 *
 * Machine-readable output format:
 * - ok: always true
 * - command: the command that was executed
 * - timestamp: ISO 8601 timestamp
 * - duration_ms: execution time in milliseconds
 * - remaining keys: command-specific result data
 */
export interface CLIResult {
  ok: true;
  command?: string;
  timestamp?: string;
  duration_ms?: number;
  [key: string]: unknown;
}

/**
 * Standard CLI error
 *
 * - ok: always false
 * - reason: machine-readable error code
 * - message: human-readable error description
 * - hint: optional suggestion for resolution
 */
export interface CLIError {
  ok: false;
  reason: string;
  message?: string;
  command?: string;
  timestamp?: string;
  hint?: string;
  [key: string]: unknown;
}

/**
 * CLI handler function signature
 * @template TInput - Validated input type (from Zod schema)
 */
export type CLIHandler<TInput> = (input: TInput) => Promise<CLIResult | CLIError>;

/**
 * A handler bound to its input schema. `run` validates raw Commander input
 * and throws `ZodError` when it does not match.
 */
export interface HandlerRegistration {
  run(rawInput: unknown): Promise<CLIResult | CLIError>;
}

export function defineHandler<TInput>(
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>,
  handler: CLIHandler<TInput>
): HandlerRegistration {
  return {
    run: (rawInput) => handler(schema.parse(rawInput)),
  };
}

export function isCLIError(value: CLIResult | CLIError): value is CLIError {
  return value.ok === false;
}

export type ExitStatus = 0 | 1 | 2;

function printResult(stream: 'stdout' | 'stderr', payload: Record<string, unknown>): void {
  const text = JSON.stringify(payload, null, 2);
  if (stream === 'stdout') console.log(text);
  else console.error(text);
}

/**
 * Run a CLI handler with validation and error handling, print its JSON
 * result and return the exit status: 0 on success, 2 when the handler
 * reports an error, 1 for invalid arguments, an unknown command or an
 * unexpected exception.
 *
 * @param commandKey - Command identifier (e.g. 'dump', 'query')
 * @param rawInput - Raw input from Commander.js (arguments + options)
 * @param handlers - Handler table; the command registry when omitted
 */
export async function runHandler(
  commandKey: string,
  rawInput: unknown,
  handlers?: Record<string, HandlerRegistration>
): Promise<ExitStatus> {
  const registry = handlers ?? (await import('./registry')).cliHandlers;
  const startedAt = Date.now();
  const timestamp = new Date().toISOString();

  const handler = registry[commandKey];
  if (!handler) {
    printResult('stderr', {
      ok: false,
      reason: 'unknown_command',
      command: commandKey,
      timestamp,
      hint: 'Run "xref-graph --help" to see available commands',
    });
    return 1;
  }

  const log = createLogger({ component: 'cli', cmd: commandKey });

  try {
    const result = await handler.run(rawInput);
    const duration_ms = Date.now() - startedAt;
    if (result.ok) {
      printResult('stdout', { ...result, command: commandKey, timestamp, duration_ms });
      return 0;
    }
    printResult('stderr', { ...result, command: commandKey, timestamp, duration_ms });
    return 2;
  } catch (e) {
    const duration_ms = Date.now() - startedAt;

    if (e instanceof z.ZodError) {
      const errors = e.issues.map((issue: z.ZodIssue) => ({
        path: issue.path.join('.'),
        message: issue.message,
        code: issue.code,
      }));
      printResult('stderr', {
        ok: false,
        reason: ErrorReasons.VALIDATION_ERROR,
        message: 'Invalid command arguments',
        command: commandKey,
        timestamp,
        duration_ms,
        errors,
        hint: ErrorHints.VALIDATION_ERROR,
      });
      return 1;
    }

    log.error(commandKey, { ok: false, err: serializeError(e) });
    printResult('stderr', {
      ok: false,
      reason: ErrorReasons.INTERNAL_ERROR,
      message: e instanceof Error ? e.message : String(e),
      command: commandKey,
      timestamp,
      duration_ms,
      hint: 'An unexpected error occurred. Check logs for details.',
    });
    return 1;
  }
}

/** Commander action entry point: run the handler and exit with its status. */
export async function executeHandler(commandKey: string, rawInput: unknown): Promise<void> {
  process.exit(await runHandler(commandKey, rawInput));
}

/**
 * Create a success result
 */
export function success(data: Record<string, unknown>): CLIResult {
  return {
    ok: true,
    ...data,
  };
}

/**
 * Create an error result
 */
export function error(reason: string, details?: Record<string, unknown>): CLIError {
  return {
    ok: false,
    reason,
    ...details,
  };
}

/**
 * Common error reasons
 */
export const ErrorReasons = {
  VALIDATION_ERROR: 'validation_error',
  INTERNAL_ERROR: 'internal_error',
  CONFIG_INVALID: 'config_invalid',
  SNAPSHOT_INVALID: 'snapshot_invalid',
  DUMP_INVALID: 'dump_invalid',
  WRITE_FAILED: 'write_failed',
  NOT_FOUND: 'not_found',
} as const;

/**
 * Common hints for error resolution
 */
export const ErrorHints = {
  VALIDATION_ERROR: 'Check command syntax with --help',
  CONFIG_INVALID: 'Config keys: excludedPrefixes, excludedSubstrings, abi, output, includeDefaults',
  SNAPSHOT_INVALID:
    'Expected { functions: [...], references: [...], demangled: { <abi>: {...} } } with unique function starts; addresses above 2^53 - 1 must be rebased to the image base',
  DUMP_INVALID: 'Run "xref-graph dump <snapshot>" to produce xref_data.json',
  WRITE_FAILED: 'Check that the output directory is writable or pass --out',
} as const;
