/**
 * Destination for the collected output.
 */
export interface OutputSink {
  /** Throws when the destination cannot be used; checked before collecting */
  ensureAvailable(): Promise<void>;
  write(content: string): Promise<void>;
  /** Status line for a run that produced nothing */
  describeEmpty(): string;
  /** Status line after a successful write of `size` (already formatted) */
  describeSuccess(size: string): string;
}
