import type { DiagnosticSink } from '@/types';
import { debug } from '@actions/core';

/**
 * Creates a diagnostic sink that forwards machine events to the GitHub Actions debug log.
 *
 * Events only show up when step debug logging is enabled (`ACTIONS_STEP_DEBUG`). Fields are
 * appended as `key=value` pairs, with values JSON encoded so that line terminators inside a
 * description or body stay on one log line.
 *
 * @returns The sink
 *
 * @example
 * ```typescript
 * const sink = createActionsSink();
 * sink.info('valid commit message type', { type: 'feat' });
 * // ::debug::valid commit message type type="feat"
 * ```
 */
export function createActionsSink(): DiagnosticSink {
  return {
    info(message: string, fields: Record<string, string> = {}): void {
      const pairs = Object.entries(fields).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
      debug([message, ...pairs].join(' '));
    },
    error(message: string): void {
      debug(`parse error: ${message}`);
    },
  };
}
