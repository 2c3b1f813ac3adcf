#!/usr/bin/env node

// Точка входа CLI travel-planner.
import { Command } from 'commander';
import { migrateCommand } from './commands/migrate-cmd.js';
import { statusCommand } from './commands/status-cmd.js';
import { schemaCommand } from './commands/schema-cmd.js';
import { searchCommand } from './commands/search-cmd.js';
import { serveCommand } from './commands/serve-cmd.js';

const program = new Command()
  .name('travel')
  .description('Travel planner backend: schema provisioning, destination search and HTTP API')
  .version('0.1.0');

program.addCommand(migrateCommand);
program.addCommand(statusCommand);
program.addCommand(schemaCommand);
program.addCommand(searchCommand);
program.addCommand(serveCommand);

program.parse();
