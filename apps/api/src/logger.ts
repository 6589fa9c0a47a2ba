import type { PipelineLogger } from '@trip-carbon/domain';

function format(meta?: Record<string, unknown>): string {
  return meta ? ` ${JSON.stringify(meta)}` : '';
}

/** Console sink for pipeline logs, tagged like the rest of the server output. */
export const consoleLogger: PipelineLogger = {
  info: (message, meta) => console.log(`${message}${format(meta)}`),
  warn: (message, meta) => console.warn(`${message}${format(meta)}`),
};
