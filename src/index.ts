#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { USAGE, parseCliArgs } from "./cli.js";
import { Config } from "./config.js";
import { InputError, errorMessage } from "./errors.js";
import { formatResult } from "./formatter.js";
import { Logger } from "./logger.js";
import { MethodCallScanner } from "./scanner.js";
import { createServer } from "./server.js";

async function main(): Promise<number> {
  const config = await Config.getInstance();
  const command = parseCliArgs(process.argv.slice(2), config);

  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  const logger = new Logger(command.verbose);
  const scanner = new MethodCallScanner({
    concurrency: command.concurrency,
    scanJars: command.scanJars,
    includeTargetClass: command.includeTargetClass,
    logger,
  });

  if (command.kind === 'mcp') {
    const server = createServer(scanner, config.scanFolder);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.debug(`MCP server ready, default scan folder ${config.scanFolder}`);
    return 0;
  }

  if (command.watch) {
    const handle = await scanner.startWatch(command.request, result => {
      console.log(formatResult(result, command.format));
    });
    process.once('SIGINT', () => {
      handle.close().then(() => process.exit(0), () => process.exit(1));
    });
    return 0;
  }

  const result = await scanner.scan(command.request);
  console.log(formatResult(result, command.format));
  return 0;
}

main().then(
  code => {
    process.exitCode = code;
  },
  err => {
    if (!(err instanceof InputError)) {
      console.error(err);
    }
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
);
