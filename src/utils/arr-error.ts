/**
 * Validation error item from the Sonarr API
 * Uses camelCase - serialized by System.Text.Json
 */
interface ArrValidationError {
  propertyName?: string
  errorMessage?: string
}

const isValidationError = (value: unknown): value is ArrValidationError =>
  typeof value === 'object' && value !== null

/**
 * Extracts a readable message from a Sonarr error body.
 * Handles both formats:
 * - Array: [{ propertyName, errorMessage, ... }] (validation errors)
 * - Object: { message: string } (general errors)
 *
 * Returns an empty string when the body carries no message.
 */
export function parseArrErrorResponse(errorData: unknown): string {
  if (Array.isArray(errorData)) {
    return errorData
      .filter(isValidationError)
      .map((e) =>
        e.propertyName && e.errorMessage
          ? `${e.propertyName}: ${e.errorMessage}`
          : e.errorMessage,
      )
      .filter(Boolean)
      .join('; ')
  }

  if (
    typeof errorData === 'object' &&
    errorData !== null &&
    'message' in errorData &&
    typeof errorData.message === 'string'
  ) {
    return errorData.message
  }

  return ''
}
