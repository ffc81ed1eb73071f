import { Command } from 'commander';
import { serveCommand } from './commands/serve.js';
import { tokenCommand } from './commands/token.js';
import { configCommand } from './commands/config.js';

export const cli = new Command();

cli
  .name('crm-gateway')
  .description('HubSpot CRM gateway: OAuth token lifecycle, retrying upstream client and inbound rate limiting')
  .version('0.1.0');

// 註冊指令
cli.addCommand(serveCommand);
cli.addCommand(tokenCommand);
cli.addCommand(configCommand);
