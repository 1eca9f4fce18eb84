/**
 * Failure of an upstream API (Sonarr, Notion or YouTube). Route handlers map
 * every subclass to a 502 unless it says otherwise.
 */
export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'UpstreamError'

    // Fix prototype chain – important after TS → JS down-emit
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export class SonarrError extends UpstreamError {
  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, status, options)
    this.name = 'SonarrError'
  }
}

export class NotionError extends UpstreamError {
  /** Notion's machine-readable error code, e.g. `rate_limited` */
  public readonly code?: string

  constructor(
    message: string,
    status?: number,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, status, options)
    this.name = 'NotionError'
    this.code = options?.code
  }
}

export class UnsupportedPropertyTypeError extends NotionError {
  constructor(
    public readonly propertyType: string,
    public readonly propertyName?: string,
  ) {
    super(
      propertyName
        ? `Unsupported property type "${propertyType}" for "${propertyName}"`
        : `Unsupported property type "${propertyType}"`,
    )
    this.name = 'UnsupportedPropertyTypeError'
  }
}

export class DatabaseNotResolvedError extends NotionError {
  constructor(public readonly title: string) {
    super(
      `Database "${title}" has not been resolved; call warmDatabases() first`,
    )
    this.name = 'DatabaseNotResolvedError'
  }
}

export class DuplicateMatchError extends NotionError {
  constructor(
    public readonly databaseId: string,
    public readonly matches: number,
  ) {
    super(`Filter matched ${matches} rows in database ${databaseId}`)
    this.name = 'DuplicateMatchError'
  }
}

export class YoutubeError extends UpstreamError {
  public readonly reason?: string

  constructor(
    message: string,
    status?: number,
    options?: { cause?: unknown; reason?: string },
  ) {
    super(message, status, options)
    this.name = 'YoutubeError'
    this.reason = options?.reason
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Coerces a thrown value into an Error, keeping the original as `cause`.
 */
export function toError(error: unknown): Error {
  return error instanceof Error
    ? error
    : new Error(String(error), { cause: error })
}
