/**
 * Status codes returned in the response header's Status field.
 * Requests carry 0 in this position.
 */
export const StatusCodes = {
  /** Request completed successfully. */
  OK: 0,

  /** The node failed while serving the request. */
  InternalServerError: 1,

  /** The requested key does not exist. */
  KeyNotFound: 2,

  /** No lock is held for the key. */
  NoSuchLock: 3,

  /** The queried partition still holds data. */
  PartitionNotEmpty: 4,

  /** The queried backup partition still holds data. */
  BackupPartitionNotEmpty: 5,
} as const;

export type StatusCode = (typeof StatusCodes)[keyof typeof StatusCodes];

/**
 * Gets a human-readable name for a status code.
 */
export function getStatusName(code: number): string {
  const entries = Object.entries(StatusCodes);
  for (const [name, value] of entries) {
    if (value === code) {
      return name;
    }
  }
  return 'UnknownStatus';
}

/**
 * Check if a status code indicates success.
 */
export function isSuccess(code: number): boolean {
  return code === StatusCodes.OK;
}

/**
 * Check if a status code indicates an error.
 */
export function isError(code: number): boolean {
  return code !== StatusCodes.OK;
}
