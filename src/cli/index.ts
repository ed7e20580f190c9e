#!/usr/bin/env node
import { Command } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerTagsCommand } from './commands/tags.js';
import { registerCiCommand } from './commands/ci.js';
import { registerVerifyCommand } from './commands/verify.js';
import { registerServeCommand } from './commands/serve.js';
import { registerDoctorCommand } from './commands/doctor.js';
import { errorMessage } from '../shared/errors.js';
import { getLogLevel, isLogLevel, setLogLevel } from '../shared/logger.js';

const program = new Command();

program
  .name('shipline')
  .description('Shipline – release pipeline orchestration for container images')
  .version('0.1.0')
  .option('--log-level <level>', 'debug | info | warn | error', getLogLevel())
  .hook('preAction', (cmd) => {
    const level: unknown = cmd.opts()['logLevel'];
    if (typeof level === 'string' && isLogLevel(level)) {
      setLogLevel(level);
    } else {
      console.error(`Unknown log level: ${String(level)}`);
      process.exit(1);
    }
  });

registerInitCommand(program);
registerTagsCommand(program);
registerCiCommand(program);
registerVerifyCommand(program);
registerServeCommand(program);
registerDoctorCommand(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
