import type {
  ErrorIndicator,
  Instance,
  OutputSink,
  ResolvedOptions,
  RunSummary,
} from '@jtd-validate/core';

const PREFIX = '[jtd-validate]';

export interface EffectiveConfig {
  schema: string;
  instances: string;
  options: ResolvedOptions;
}

/**
 * Print the resolved configuration to stderr.
 * Intended to be used behind the --debug flag.
 */
export function printEffectiveConfig(
  stderr: OutputSink,
  config: EffectiveConfig
): void {
  stderr.write(
    `${PREFIX} effective config: ${JSON.stringify(config, null, 2)}\n`
  );
}

/** One line per validated instance, behind --debug. */
export function printInstanceTrace(
  stderr: OutputSink,
  instance: Instance,
  indicators: readonly ErrorIndicator[]
): void {
  const verdict =
    indicators.length === 0 ? 'ok' : `${indicators.length} error(s)`;
  stderr.write(
    `${PREFIX} instance #${instance.index} at byte ${instance.offset}: ${verdict}\n`
  );
}

export function printSummary(stderr: OutputSink, summary: RunSummary): void {
  stderr.write(`${PREFIX} summary: ${JSON.stringify(summary)}\n`);
}
