/**
 * `s3-rest serve`: run the logging server until interrupted
 */

import { createLogServer, type LogServer } from '../../server/index.js';
import type { HttpTransport } from '../../transport/index.js';
import { createCliLogger, parseOutputMode } from '../args.js';

export interface ServeArguments {
  readonly port: number;
  readonly host?: string;
  readonly upstream?: string;
  readonly logLevel: string;
}

export interface ServeDependencies {
  readonly transport?: HttpTransport;
  /** Stop on SIGINT and SIGTERM; on by default */
  readonly handleSignals?: boolean;
}

export async function runServe(args: ServeArguments, deps: ServeDependencies = {}): Promise<LogServer> {
  const logger = createCliLogger(parseOutputMode(args.logLevel).level);
  const server = createLogServer({
    port: args.port,
    host: args.host,
    upstream: args.upstream,
    logger,
    transport: deps.transport,
  });
  await server.start();

  if (deps.handleSignals ?? true) {
    const shutdown = (): void => {
      server.stop().catch((error: unknown) => {
        logger.error('Failed to stop log server', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exitCode = 1;
      });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  }
  return server;
}
