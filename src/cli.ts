/**
 * CLI argument parsing
 */

import { ConfigError } from './errors.js';

// ============================================
// CLI Arguments
// ============================================

export interface CliArgs {
  command: 'serve' | 'seed' | 'help';
  port?: number;
  databasePath?: string;
  seedFile: string;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    command: 'serve',
    seedFile: 'data/seed.json',
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === 'serve' || arg === 'seed' || arg === 'help') {
      result.command = arg;
    } else if (arg === '--port' || arg === '-p') {
      const port = parseInt(args[++i] ?? '', 10);
      if (Number.isNaN(port)) {
        throw new ConfigError([`${arg}: expected a port number`]);
      }
      result.port = port;
    } else if (arg === '--db') {
      const path = args[++i];
      if (!path) {
        throw new ConfigError(['--db: expected a database path']);
      }
      result.databasePath = path;
    } else if (arg === '--file' || arg === '-f') {
      const path = args[++i];
      if (!path) {
        throw new ConfigError([`${arg}: expected a seed file path`]);
      }
      result.seedFile = path;
    } else if (arg === '--help' || arg === '-h') {
      result.command = 'help';
    } else {
      throw new ConfigError([`Unknown argument: ${arg}`]);
    }
  }

  return result;
}

export function printHelp(): void {
  console.log(`
Crowdfund Catalog - REST API for games, publishers and categories

Usage: crowdfund-catalog [command] [options]

Commands:
  serve     Start the API server (default)
  seed      Load seed data into an empty database
  help      Show this help message

Options:
  -p, --port <port>   Server port (default: $PORT or 5100)
  --db <path>         SQLite database file (default: $DATABASE_PATH or data/catalog.db)
  -f, --file <path>   Seed file for the seed command (default: data/seed.json)
  -h, --help          Show help

Environment:
  PORT, HOST, DATABASE_PATH, CORS_ORIGINS (comma-separated)
`);
}
