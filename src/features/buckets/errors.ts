export type BucketErrorCode =
  | 'INVALID_BOUNDARY'
  | 'INVERTED_RANGE'
  | 'AXIS_MISMATCH'
  | 'TABLE_MISMATCH'
  | 'UNSORTED_TABLE'

/**
 * Raised when a bucket or tier is built from inconsistent inputs.
 * Catalog edits are the usual source, so these surface at module load.
 */
export class BucketError extends Error {
  constructor(
    message: string,
    public readonly code: BucketErrorCode
  ) {
    super(message)
    this.name = 'BucketError'
  }
}
