import type { DisplayLogEvent } from '../displayTypes';

export function formatLogEvent(event: DisplayLogEvent): string {
  const details = event.details ? ` ${JSON.stringify(event.details)}` : '';
  return `${event.level.toUpperCase()} ${event.scope}: ${event.message}${details}`;
}

// stdout carries JSON-RPC traffic, so logs go to stderr.
export function createStderrLogger(options: { verbose?: boolean } = {}): (event: DisplayLogEvent) => void {
  return event => {
    if (event.level === 'debug' && !options.verbose) {
      return;
    }
    process.stderr.write(`${formatLogEvent(event)}\n`);
  };
}
