import type { Command } from 'commander';
import { startServer } from '../../api/server.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the webhook receiver and run status API')
    .option('--host <host>', 'Bind host (default: server.host from config)')
    .option('--port <port>', 'Port (default: server.port from config)')
    .action(async (opts: { host?: string; port?: string }) => {
      const port = opts.port === undefined ? undefined : Number.parseInt(opts.port, 10);
      if (port !== undefined && Number.isNaN(port)) {
        console.error(`Invalid port: ${opts.port ?? ''}`);
        process.exit(1);
      }

      console.log('Starting Shipline...');
      console.log('\nPress Ctrl+C to stop\n');

      await startServer({ host: opts.host, port });
    });
}
