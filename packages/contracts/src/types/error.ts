/**
 * Error codes raised while decoding a map.
 */
export type ParseErrorCode = "GENOME_PARSE_FAILED" | "GRID_INVALID";

/**
 * Error codes raised when a run cannot satisfy its configuration.
 */
export type ConfigurationErrorCode =
  | "VISIBILITY_DEGENERATE"
  | "NO_CANDIDATE_ROOM"
  | "NO_CANDIDATE_TILE"
  | "RESOURCE_PLAN_INVALID"
  | "TILE_OCCUPIED";

/**
 * Error codes raised when room geometry breaks an invariant.
 */
export type GeometryErrorCode =
  | "ROOM_INVALID"
  | "MERGE_DID_NOT_CONVERGE"
  | "ROOM_NOT_ENCODABLE";

export type LevelErrorCode =
  | ParseErrorCode
  | ConfigurationErrorCode
  | GeometryErrorCode;

export type LevelErrorKind = "parse" | "configuration" | "geometry";

/**
 * Base error for every failure of the level analysis pipeline.
 *
 * @example
 * ```typescript
 * throw new ConfigurationError(
 *   "NO_CANDIDATE_TILE",
 *   "Room r3 has no free tile left for medkit",
 *   { kind: "medkit", iteration: 2 },
 * );
 * ```
 */
export class LevelError extends Error {
  override readonly name: string = "LevelError";

  constructor(
    readonly kind: LevelErrorKind,
    readonly code: LevelErrorCode,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Check if an unknown error is a LevelError.
   */
  static isLevelError(error: unknown): error is LevelError {
    return error instanceof LevelError;
  }

  toJSON(): {
    name: string;
    kind: LevelErrorKind;
    code: LevelErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      kind: this.kind,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Malformed genome or map text.
 */
export class ParseError extends LevelError {
  override readonly name = "ParseError";
  declare readonly code: ParseErrorCode;

  constructor(
    code: ParseErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super("parse", code, message, details);
  }
}

/**
 * The requested placement cannot be carried out on this level.
 */
export class ConfigurationError extends LevelError {
  override readonly name = "ConfigurationError";
  declare readonly code: ConfigurationErrorCode;

  constructor(
    code: ConfigurationErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super("configuration", code, message, details);
  }
}

/**
 * A room list violates the reducer's invariants.
 */
export class GeometryError extends LevelError {
  override readonly name = "GeometryError";
  declare readonly code: GeometryErrorCode;

  constructor(
    code: GeometryErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super("geometry", code, message, details);
  }
}
