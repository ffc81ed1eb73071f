/**
 * Token Command
 * 以 refresh token 換取一次 access token，只輸出不含秘密的狀態
 */

import { Command } from 'commander';
import { formatDuration } from '../lib/logger.js';
import { createTokenManager } from '../server/bootstrap.js';
import { loadConfigOrExit } from './config.js';

export const EXIT_UPSTREAM_ERROR = 2;

interface TokenOptions {
  config?: string;
}

export const tokenCommand = new Command('token')
  .description('執行一次 token 更新並輸出憑證狀態')
  .option('-c, --config <path>', '設定檔路徑')
  .action(async (options: TokenOptions) => {
    const tokens = createTokenManager(loadConfigOrExit(options.config));

    const startTime = Date.now();
    const result = await tokens.refresh();
    const elapsed = formatDuration(Date.now() - startTime);

    if (!result.ok) {
      console.log(JSON.stringify({ success: false, elapsed, error: result.error }, null, 2));
      process.exit(EXIT_UPSTREAM_ERROR);
    }

    console.log(JSON.stringify({ success: true, elapsed, state: tokens.getState() }, null, 2));
  });
