/**
 * Raised when a fail-fast configuration aborts on its first record failure
 */
export class ExperimentError extends Error {
  readonly configurationId: string;
  readonly recordId: string;

  constructor(configurationId: string, recordId: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Configuration ${configurationId} failed on record ${recordId}: ${detail}`, { cause });
    this.name = 'ExperimentError';
    this.configurationId = configurationId;
    this.recordId = recordId;
  }
}

/**
 * A record task failure, tagged with the record it belongs to
 */
export class RecordTaskError extends Error {
  readonly recordId: string;

  constructor(recordId: string, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'RecordTaskError';
    this.recordId = recordId;
  }
}
