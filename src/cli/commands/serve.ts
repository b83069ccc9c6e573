/**
 * `target-sense serve`: run the language server.
 */
import { Command } from 'commander';
import { startServer } from '../../server/server.js';

/**
 * Create the serve command. The transport flag (`--stdio`, `--node-ipc` or
 * `--socket=<port>`) is read from the process arguments by the protocol
 * library itself.
 */
export function createServeCommand(): Command {
  return new Command('serve')
    .description('Start the language server')
    .option('--stdio', 'Communicate over stdin/stdout (default)')
    .option('--node-ipc', 'Communicate over Node IPC')
    .option('--socket <port>', 'Communicate over a socket')
    .option('--config <path>', 'Path to config file, relative to the workspace root')
    .action((options: { config?: string }) => {
      if (!process.argv.some((arg) => arg === '--node-ipc' || arg.startsWith('--socket'))) {
        if (!process.argv.includes('--stdio')) {
          process.argv.push('--stdio');
        }
      }
      startServer({ configPath: options.config });
    });
}
