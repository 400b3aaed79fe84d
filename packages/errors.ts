/**
 * Error taxonomy shared by every pipeline stage.
 *
 * Each failure kind is its own subclass so callers can branch with
 * `instanceof` or on the `kind` discriminant.
 */

export type PlotSQLErrorKind = 'syntax' | 'resolution' | 'rewrite' | 'execution' | 'synthesis';

export abstract class PlotSQLError extends Error {
  abstract readonly kind: PlotSQLErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface SourcePosition {
  /** 1-based line in the full query text */
  line: number;
  /** 1-based column in the full query text */
  column: number;
  /** 0-based character offset in the full query text */
  offset: number;
}

/**
 * The clause text does not match the grammar, or names something the
 * grammar does not know (a geom, a setting, a scale type).
 */
export class ParseError extends PlotSQLError {
  readonly kind = 'syntax' as const;

  constructor(
    message: string,
    readonly position: SourcePosition | null,
    readonly token: string | null = null,
    /** Grammar rules that were active when the error was raised, outermost first */
    readonly context: string[] = []
  ) {
    super(position ? `${message} (line ${position.line}, column ${position.column})` : message);
  }

  get line(): number | null {
    return this.position?.line ?? null;
  }

  get column(): number | null {
    return this.position?.column ?? null;
  }

  /** Re-anchor a position that was computed relative to a clause substring. */
  relocate(origin: SourcePosition): ParseError {
    if (!this.position) return this;
    const line = origin.line + this.position.line - 1;
    const column = this.position.line === 1 ? origin.column + this.position.column - 1 : this.position.column;
    const relocated = new ParseError(
      this.message.replace(/ \(line \d+, column \d+\)$/, ''),
      { line, column, offset: origin.offset + this.position.offset },
      this.token,
      this.context
    );
    relocated.stack = this.stack;
    return relocated;
  }
}

export class ResolutionError extends PlotSQLError {
  readonly kind = 'resolution' as const;

  constructor(
    message: string,
    readonly layerIndex: number | null = null,
    readonly geom: string | null = null,
    readonly missing: string[] = []
  ) {
    super(message);
  }
}

export class RewriteError extends PlotSQLError {
  readonly kind = 'rewrite' as const;

  constructor(message: string, readonly layerIndex: number | null = null) {
    super(message);
  }
}

/**
 * Raised by a Reader. The message is the engine's own; the original error
 * is kept as `cause`.
 */
export class ExecutionError extends PlotSQLError {
  readonly kind = 'execution' as const;

  constructor(message: string, readonly sql: string, cause?: unknown) {
    super(message, { cause });
  }

  static from(error: unknown, sql: string): ExecutionError {
    if (error instanceof ExecutionError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new ExecutionError(message, sql, error);
  }
}

/** Internal invariant violated while building the output document. */
export class SynthesisError extends PlotSQLError {
  readonly kind = 'synthesis' as const;
}

export function isPlotSQLError(value: unknown): value is PlotSQLError {
  return value instanceof PlotSQLError;
}
