import type { Server } from 'http';
import type { AppContext } from '../context.js';
import { InvalidConfigError } from '../errors.js';
import { createApp, startServer } from '../server.js';

export function parseServeArgs(args: string[], fallbackPort: number): { port: number } {
  const i = args.indexOf('--port');
  if (i === -1) return { port: fallbackPort };
  const port = Number(args[i + 1]);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidConfigError('--port: expects a port number', [{ path: '--port', message: 'expects a port number' }]);
  }
  return { port };
}

export async function runServe(args: string[], ctx: AppContext): Promise<Server> {
  const { port } = parseServeArgs(args, ctx.config.server.port);
  const app = createApp({ generator: ctx.generator, defaults: ctx.config.defaults });
  return startServer(app, port);
}
