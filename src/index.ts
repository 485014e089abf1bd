#!/usr/bin/env node

/**
 * Script Storyboard Generator - Entry Point
 *
 * With --script the process runs one batch and exits; otherwise it serves the
 * HTTP API until interrupted.
 */

import { getConfig, printConfigInfo } from './config.js';
import { StoryboardApp } from './presentation/StoryboardApp.js';

async function main() {
  let app: StoryboardApp | null = null;

  try {
    // Load configuration
    const config = getConfig();

    // Print configuration info
    printConfigInfo(config);

    app = new StoryboardApp(config);

    if (config.cli) {
      const controller = new AbortController();
      process.once('SIGINT', () => {
        console.error('\n📛 Received SIGINT, cancelling remaining scenes...');
        controller.abort();
      });

      const exitCode = await app.runCli(controller.signal);
      app.printStats();
      process.exit(exitCode);
    }

    await app.startServer();
    console.error('\n🚀 Server is running. Press Ctrl+C to stop.\n');

    const running = app;
    // Setup graceful shutdown
    const shutdown = async (signal: string) => {
      console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);
      await running.shutdown();
      running.printStats();
      console.error('👋 Goodbye!\n');
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection:', reason);
      void shutdown('UNHANDLED_REJECTION');
    });
  } catch (error) {
    console.error('💥 Fatal error in main():', error);

    // Cleanup on error
    if (app) {
      await app.shutdown();
    }

    process.exit(1);
  }
}

// Start the application
void main();
