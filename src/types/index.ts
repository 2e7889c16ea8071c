/**
 * Types
 */

export type { ApiError, ApiErrorType, FetchFn, Result } from './common'
