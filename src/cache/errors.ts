/**
 * Cache Errors
 */

/**
 * A table entry exists but its payload cannot be turned back into a value:
 * unknown type tag, or pickle bytes that are not valid. Always surfaced to the caller.
 */
export class DeserializationError extends Error {
  constructor(
    message: string,
    readonly payloadType: string
  ) {
    super(message)
    this.name = 'DeserializationError'
  }
}

/**
 * A table file exists but is not a JSON object. Read paths treat this as a miss.
 */
export class CorruptTableError extends Error {
  constructor(
    readonly path: string,
    reason: string
  ) {
    super(`Corrupt cache table ${path}: ${reason}`)
    this.name = 'CorruptTableError'
  }
}
