/**
 * Lexer Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import { ERROR_REGISTRY, renderMessage } from './error-registry.js';
import type { ErrorCategory } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LexErrorData {
  readonly errorId: string;
  readonly message: string;
  /** Byte offset of the cursor when the error was raised */
  readonly position?: number | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all engine errors.
 * Provides structured data for host applications to format as needed.
 */
export class LexError extends Error {
  readonly errorId: string;
  readonly position?: number | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: LexErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'LexError';
    this.errorId = data.errorId;
    this.position = data.position;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LexErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      position: this.position,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LexErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    const where = this.position === undefined ? '' : ` at byte ${this.position}`;
    return `${this.errorId}: ${this.message}${where}`;
  }
}

function checkCategory(errorId: string, expected: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== expected) {
    throw new TypeError(`Expected ${expected} error ID, got: ${errorId}`);
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Lexical errors reported by transitions through `lexer.error()` */
export class ScanError extends LexError {
  override readonly position: number;

  constructor(
    errorId: string,
    message: string,
    position: number,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'scan');
    super({ errorId, message, position, context });
    this.name = 'ScanError';
    this.position = position;
  }
}

/** Run lifecycle misuse (double start, reading before start) */
export class EngineError extends LexError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'run');
    super({ errorId, message, context });
    this.name = 'EngineError';
  }
}

/** Malformed state tables */
export class StateError extends LexError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'state');
    super({ errorId, message, context });
    this.name = 'StateError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create the error class matching the registry category of `errorId`, with
 * the message rendered from its template.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('LEX-T001', { from: 'number', to: 'nope' })
 * // StateError: "State number returned unknown state nope"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  position?: number
): LexError {
  const definition = ERROR_REGISTRY.get(errorId);

  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  switch (definition.category) {
    case 'scan':
      return new ScanError(errorId, message, position ?? 0, context);
    case 'run':
      return new EngineError(errorId, message, context);
    case 'state':
      return new StateError(errorId, message, context);
  }
}
