/**
 * Serve Command
 * 啟動 HTTP gateway，收到 SIGINT / SIGTERM 時停止接受新連線後結束
 */

import { Command } from 'commander';
import { loggers } from '../lib/logger.js';
import { createApp, startServer } from '../server/app.js';
import { buildGateway } from '../server/bootstrap.js';
import { loadConfigOrExit } from './config.js';

interface ServeOptions {
  config?: string;
  port?: string;
}

/**
 * 解析 --port，未指定時回傳 undefined
 */
export function parsePort(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535 || String(port) !== value.trim()) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

export const serveCommand = new Command('serve')
  .description('啟動 HTTP gateway')
  .option('-c, --config <path>', '設定檔路徑')
  .option('-p, --port <port>', '監聽埠號（覆寫 APP_PORT）')
  .action(async (options: ServeOptions) => {
    const config = loadConfigOrExit(options.config);
    const port = parsePort(options.port) ?? config.port;

    const gateway = buildGateway(config);
    const app = createApp(gateway);

    const server = await loggers.server.trackAsync('Server start', () => startServer(app, port, config.host), {
      host: config.host,
      port,
    });

    const shutdown = (signal: string): void => {
      loggers.server.info('Shutting down', { signal });
      server.close((error) => {
        if (error) {
          loggers.server.error('Server close failed', error);
          process.exit(1);
        }
        process.exit(0);
      });
    };

    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });
