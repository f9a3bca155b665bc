/**
 * Configuration options for the retry mechanism.
 */
export interface RetryOptions {
  /** Maximum number of attempts, including the first one. */
  maxRetries: number;
  /** Delay in milliseconds before the first retry. */
  initialDelay: number;
  /** Upper bound in milliseconds for any single wait. */
  maxDelay: number;
  /** Multiplier applied to the delay after each failed attempt. */
  factor: number;
  /** Return false to give up immediately on an error that cannot succeed on retry. */
  shouldRetry?: (error: Error) => boolean;
  /** Called before each retry with the error and the attempt that failed. */
  onRetry?: (error: Error, attempt: number) => void;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  initialDelay: 100,
  maxDelay: 5000,
  factor: 2,
  onRetry: (error, attempt) => {
    console.warn(`Retry attempt ${attempt} after error: ${error.message}`);
  },
};
