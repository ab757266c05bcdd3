#!/usr/bin/env tsx
/**
 * PRD Chat CLI
 *
 * Entry point for starting the PRD Chat server from the command line.
 *
 * Usage:
 *   prdchat start [--port <n>]  - Start the server
 *   prdchat --help              - Show help
 *   prdchat --version           - Show version
 */

import { VERSION } from "@prdchat/core";
import { startServer } from "./index.ts";

const HELP = `
PRD Chat v${VERSION} - Chat your way to a compact PRD

Usage:
  prdchat start [--port <n>]  Start the server

  prdchat --help, -h          Show this help message
  prdchat --version, -v       Show version

Examples:
  prdchat start               # Start on the default port
  prdchat start --port 8080   # Start on port 8080

Environment Variables:
  PORT                           Server port (default: 3456)
  PRDCHAT_SESSION_TTL_MINUTES    Idle minutes before a session expires (default: 60)
  PRDCHAT_MAX_MESSAGE_LENGTH     Longest accepted chat message (default: 10000)
`;

function showHelp(): void {
  console.log(HELP);
  process.exit(0);
}

function showVersion(): void {
  console.log(`PRD Chat v${VERSION}`);
  process.exit(0);
}

function parsePort(value: string | undefined): number {
  const port = Number(value);
  if (!value || !Number.isInteger(port) || port < 1 || port > 65535) {
    console.error(`Error: Invalid port: ${value ?? "(missing)"}`);
    process.exit(1);
  }
  return port;
}

function main(): void {
  const args = process.argv.slice(2);

  // No args - show help
  if (args.length === 0) {
    showHelp();
    return;
  }

  const command = args[0];

  // Handle flags
  if (command === "--help" || command === "-h") {
    showHelp();
    return;
  }

  if (command === "--version" || command === "-v") {
    showVersion();
    return;
  }

  // Handle commands
  if (command === "start") {
    const portFlag = args.indexOf("--port");
    startServer(portFlag === -1 ? {} : { port: parsePort(args[portFlag + 1]) });
    return;
  }

  // Unknown command
  console.error(`Unknown command: ${command}`);
  console.error('Run "prdchat --help" for usage information.');
  process.exit(1);
}

try {
  main();
} catch (error) {
  console.error("Fatal error:", error);
  process.exit(1);
}
