/**
 * Config Command
 * 設定檢視指令 - 輸出合併後的設定（秘密欄位遮罩）
 */

import { Command } from 'commander';
import Table from 'cli-table3';
import { ConfigError, ConfigService, type ConfigEntry } from '../services/config.js';
import type { GatewayConfig } from '../types/config.js';

export const EXIT_CONFIG_ERROR = 3;

export type ConfigFormat = 'json' | 'table';

interface ConfigShowOptions {
  config?: string;
  format: string;
}

export const configCommand = new Command('config').description('檢視 gateway 設定');

/**
 * crm-gateway config show
 */
configCommand
  .command('show')
  .description('顯示解析後的設定（秘密欄位遮罩）')
  .option('-c, --config <path>', '設定檔路徑')
  .option('-f, --format <format>', '輸出格式: json (default) | table', 'json')
  .action((options: ConfigShowOptions) => {
    if (options.format !== 'json' && options.format !== 'table') {
      console.error(`❌ Unknown format: ${options.format} (expected json or table)`);
      process.exit(1);
    }

    try {
      const entries = new ConfigService(options.config).describe();
      console.log(renderConfig(entries, options.format));
    } catch (error) {
      reportConfigError(error);
    }
  });

export function renderConfig(entries: ConfigEntry[], format: ConfigFormat): string {
  if (format === 'json') {
    const values: Record<string, string> = {};
    for (const entry of entries) {
      values[entry.key] = entry.value;
    }
    return JSON.stringify(values, null, 2);
  }

  const table = new Table({
    head: ['Key', 'Env', 'Value'],
    style: { head: ['cyan'] },
  });
  for (const entry of entries) {
    table.push([entry.key, entry.env, entry.value]);
  }
  return table.toString();
}

/**
 * 設定錯誤以 exit code 3 結束，其他錯誤原樣拋出
 */
export function reportConfigError(error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(`❌ ${error.message}`);
    process.exit(EXIT_CONFIG_ERROR);
  }
  throw error;
}

/**
 * 讀取並驗證設定；設定不合法時直接結束程式
 */
export function loadConfigOrExit(configPath?: string): GatewayConfig {
  try {
    return new ConfigService(configPath).resolve();
  } catch (error) {
    return reportConfigError(error);
  }
}
