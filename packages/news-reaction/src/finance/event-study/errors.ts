export const NEWS_REACTION_ERROR_CODE = [
  "INPUT_SCHEMA_VIOLATION",
  "INVALID_INPUT_ROW",
  "INVALID_TIMESTAMP",
  "INVALID_TIME_ZONE",
  "INVALID_CONFIG",
  "TABLE_FORMAT",
  "UNEXPECTED",
] as const

export type NewsReactionErrorCode = (typeof NEWS_REACTION_ERROR_CODE)[number]

export class NewsReactionError extends Error {
  constructor(
    message: string,
    public readonly code: NewsReactionErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = "NewsReactionError"
  }

  static wrap(error: unknown, fallbackCode: NewsReactionErrorCode = "UNEXPECTED"): NewsReactionError {
    if (error instanceof NewsReactionError) return error
    if (error instanceof Error) {
      return new NewsReactionError(error.message, fallbackCode, {
        cause: error.name,
      })
    }
    return new NewsReactionError(String(error), fallbackCode)
  }
}

export class InputSchemaViolationError extends NewsReactionError {
  constructor(
    public readonly table: string,
    public readonly column: string,
    details?: Record<string, unknown>,
  ) {
    super(`Input table '${table}' is missing required column '${column}'`, "INPUT_SCHEMA_VIOLATION", {
      table,
      column,
      ...details,
    })
    this.name = "InputSchemaViolationError"
  }
}

export class InvalidInputRowError extends NewsReactionError {
  constructor(table: string, rowIndex: number, message: string, details?: Record<string, unknown>) {
    super(`Invalid row ${rowIndex} in '${table}': ${message}`, "INVALID_INPUT_ROW", {
      table,
      row_index: rowIndex,
      ...details,
    })
    this.name = "InvalidInputRowError"
  }
}

export class InvalidTimestampError extends NewsReactionError {
  constructor(value: unknown, details?: Record<string, unknown>) {
    super(`Invalid timestamp: ${String(value)}`, "INVALID_TIMESTAMP", details)
    this.name = "InvalidTimestampError"
  }
}

export class InvalidTimeZoneError extends NewsReactionError {
  constructor(timeZone: string) {
    super(`Unknown IANA time zone: ${timeZone}`, "INVALID_TIME_ZONE", { time_zone: timeZone })
    this.name = "InvalidTimeZoneError"
  }
}

export class ConfigError extends NewsReactionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "INVALID_CONFIG", details)
    this.name = "ConfigError"
  }
}

export class TableFormatError extends NewsReactionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "TABLE_FORMAT", details)
    this.name = "TableFormatError"
  }
}
