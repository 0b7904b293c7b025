/**
 * Shared album addressing.
 */

/**
 * Identity of a shared photo stream, derived from the public album URL.
 * Recomputed on every call, never persisted.
 */
export interface StreamIdentity {
  /** Opaque alphanumeric album token */
  token: string;

  /** Server shard decoded from the token */
  partition: number;

  /** Base URL of the stream endpoints on the shard */
  baseUrl: string;
}
