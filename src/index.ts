#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { server } from './server.js';
import { loadConfig } from './config.js';
import { errorMessage } from './tools/odt/errors.js';
import { logToStderr, setLogLevel } from './utils/logger.js';

async function runServer() {
  try {
    logToStderr('info', 'Loading configuration...');
    const config = await loadConfig();
    setLogLevel(config.logLevel);
    logToStderr('info', `Configuration loaded (staging root: ${config.stagingRoot})`);

    process.on('uncaughtException', (error) => {
      logToStderr('error', `Uncaught exception: ${errorMessage(error)}`);
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      logToStderr('error', `Unhandled rejection: ${errorMessage(reason)}`);
      process.exit(1);
    });

    const transport = new StdioServerTransport();
    logToStderr('info', 'Connecting server...');
    await server.connect(transport);
    logToStderr('info', 'Server connected successfully');
  } catch (error) {
    logToStderr('error', `Failed to start server: ${errorMessage(error)}`);
    if (error instanceof Error && error.stack) {
      logToStderr('debug', error.stack);
    }
    process.exit(1);
  }
}

runServer().catch((error) => {
  logToStderr('error', `Fatal error running server: ${errorMessage(error)}`);
  process.exit(1);
});
