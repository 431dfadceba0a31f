// Simulated failures: how each injected fault reads to the user and how
// print mode reports it through the exit status.

import type { FailureSpec } from './scenario.js';

/**
 * Text shown in the transcript (and on stderr in print mode) for a failure
 */
export function failureMessage(failure: FailureSpec): string {
  switch (failure.type) {
    case 'network_unreachable':
      return 'Error: Network is unreachable';
    case 'connection_timeout':
      return `Error: Connection timed out after ${failure.after_ms}ms`;
    case 'auth_error':
      return `Error: ${failure.message}`;
    case 'rate_limit':
      return `Error: Rate limited. Retry after ${failure.retry_after} seconds.`;
    case 'out_of_credits':
      return 'Error: No credits remaining';
    case 'partial_response':
      return `Partial response: ${failure.partial_text}`;
    case 'malformed_json':
      return `Malformed response: ${failure.raw}`;
  }
}

/** Process exit status print mode uses for a failure */
export function failureExitCode(failure: FailureSpec): number {
  switch (failure.type) {
    case 'partial_response':
      return 2;
    case 'malformed_json':
      return 0;
    default:
      return 1;
  }
}

/** Extra wait before the failure surfaces, beyond the rule's own delay */
export function failureLatencyMs(failure: FailureSpec): number {
  return failure.type === 'connection_timeout' ? failure.after_ms : 0;
}
