#!/usr/bin/env -S node --import tsx
import 'dotenv/config';
import { Command } from 'commander';
import { serverCommand } from './commands/server.js';
import { usersCommand } from './commands/users.js';

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('davgate')
    .description('WebDAV file share with Basic authentication and quota reporting')
    .version('1.0.0');

  program.addCommand(serverCommand);
  program.addCommand(usersCommand);

  await program.parseAsync();
}

main().catch((error) => {
  console.error('CLI error:', error);
  process.exit(1);
});
