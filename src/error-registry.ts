/**
 * Error Registry
 * Error definitions keyed by ID, with message templates
 */

/** Error category determining error ID prefix */
export type ErrorCategory = 'scan' | 'run' | 'state';

export interface ErrorDefinition {
  /** Format: LEX-{category letter}{3-digit} (e.g., LEX-S001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Short human-readable title */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
}

export type ErrorRegistry = ReadonlyMap<string, ErrorDefinition>;

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Scan (LEX-S0xx)
  {
    errorId: 'LEX-S001',
    category: 'scan',
    description: 'Lexical error',
    messageTemplate: '{message}',
  },
  {
    errorId: 'LEX-S002',
    category: 'scan',
    description: 'Unhandled lexical error',
    messageTemplate: '{message}',
  },

  // Run lifecycle (LEX-R0xx)
  {
    errorId: 'LEX-R001',
    category: 'run',
    description: 'Lexer already started',
    messageTemplate: 'Lexer already started ({mode} run); a lexer runs once',
  },
  {
    errorId: 'LEX-R002',
    category: 'run',
    description: 'Emit outside a run',
    messageTemplate: 'Token emitted before the lexer was started',
  },
  {
    errorId: 'LEX-R003',
    category: 'run',
    description: 'Emit after close',
    messageTemplate: 'Token emitted after the token stream was closed',
  },

  // State tables (LEX-T0xx)
  {
    errorId: 'LEX-T001',
    category: 'state',
    description: 'Unknown state',
    messageTemplate: 'State {from} returned unknown state {to}',
  },
  {
    errorId: 'LEX-T002',
    category: 'state',
    description: 'Missing start state',
    messageTemplate: 'State table has no state named {name}',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new Map(
  ERROR_DEFINITIONS.map((def) => [def.errorId, def])
);

/**
 * Fill `{name}` placeholders from `context`. Missing values render empty;
 * an unclosed brace is left as written.
 *
 * @example
 * renderMessage('State {from} returned unknown state {to}', { from: 'a', to: 'b' })
 * // "State a returned unknown state b"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  return template.replace(/\{([^{}]*)\}/g, (_match, key: string) => {
    const value = context[key];
    return value === undefined ? '' : String(value);
  });
}
