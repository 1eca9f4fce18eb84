import { parseArrErrorResponse } from '@utils/arr-error.js'
import { describe, expect, it } from 'vitest'

describe('arr-error', () => {
  describe('parseArrErrorResponse', () => {
    describe('array format (validation errors)', () => {
      it('should prefix each message with its property name', () => {
        const errorData = [
          {
            propertyName: 'SeriesId',
            errorMessage: 'Series does not exist',
            attemptedValue: 999,
            severity: 'Error',
          },
        ]

        expect(parseArrErrorResponse(errorData)).toBe(
          'SeriesId: Series does not exist',
        )
      })

      it('should join multiple messages with semicolons', () => {
        const errorData = [
          { propertyName: 'Start', errorMessage: 'Must be a date' },
          { errorMessage: 'Window too large' },
        ]

        expect(parseArrErrorResponse(errorData)).toBe(
          'Start: Must be a date; Window too large',
        )
      })

      it('should skip entries without a message', () => {
        const errorData = [{ propertyName: 'Start' }, null, 'text']

        expect(parseArrErrorResponse(errorData)).toBe('')
      })
    })

    describe('object format', () => {
      it('should return the message field', () => {
        expect(parseArrErrorResponse({ message: 'NotFound' })).toBe('NotFound')
      })

      it('should ignore a non-string message', () => {
        expect(parseArrErrorResponse({ message: 42 })).toBe('')
      })
    })

    it('should return an empty string for bodies it cannot read', () => {
      expect(parseArrErrorResponse(null)).toBe('')
      expect(parseArrErrorResponse('Internal Server Error')).toBe('')
    })
  })
})
