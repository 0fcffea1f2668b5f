#!/usr/bin/env node
/**
 * Crowdfund Catalog - Main Entry Point
 * Provides CLI for starting the API server and seeding the database
 */

import { resolve } from 'path';
import { parseArgs, printHelp } from './cli.js';
import { loadConfig, type AppConfig } from './config.js';
import { ConfigError } from './errors.js';
import { ApiServer } from './server/express.js';
import { loadSeedFile, openDatabase, seedDatabase } from './storage/index.js';

// ============================================
// Commands
// ============================================

function runSeed(config: AppConfig, seedFile: string): void {
  const path = resolve(seedFile);
  const db = openDatabase({ path: config.databasePath, verbose: true });
  console.log(`Seeding ${db.getPath()} from ${path}...`);

  try {
    const summary = seedDatabase(db, loadSeedFile(path));
    console.log(
      `Seeded ${summary.categories} categories, ${summary.publishers} publishers, ${summary.games} games`
    );
  } finally {
    db.close();
  }
}

async function runServe(config: AppConfig): Promise<void> {
  console.log('Starting Crowdfund Catalog API...');

  const db = openDatabase({ path: config.databasePath, verbose: true });
  console.log(`Database: ${db.getPath()}`);
  const server = new ApiServer(db, {
    port: config.port,
    host: config.host,
    corsOrigins: config.corsOrigins,
  });

  const shutdown = (signal: string): void => {
    console.log(`\nReceived ${signal}, shutting down...`);
    server.stop()
      .then(() => {
        db.close();
        process.exit(0);
      })
      .catch((error: unknown) => {
        console.error('Error during shutdown:', error);
        db.close();
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
}

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.command === 'help') {
    printHelp();
    return;
  }

  const env = loadConfig();
  const config: AppConfig = {
    ...env,
    port: args.port ?? env.port,
    databasePath: args.databasePath ?? env.databasePath,
  };

  if (args.command === 'seed') {
    runSeed(config, args.seedFile);
    return;
  }

  await runServe(config);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(1);
});
