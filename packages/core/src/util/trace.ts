import type { ResolvedOptions, TraceSink } from '../types/options.js';

export type Tracer = (message: string) => void;

const TRACE_PREFIX = '[modelform]';

const stderrSink: TraceSink = (line) => {
  process.stderr.write(`${line}\n`);
};

const silent: Tracer = () => undefined;

export function createTracer(
  options: Pick<ResolvedOptions, 'trace' | 'traceSink'>
): Tracer {
  if (!options.trace) return silent;
  const sink = options.traceSink ?? stderrSink;
  return (message) => sink(`${TRACE_PREFIX} ${message}`);
}
