import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import { OUTPUT_FORMATS, formatResult, formatWarnings } from "./formatter.js";
import type { MethodCallScanner } from "./scanner.js";

export const SERVER_VERSION = "1.0.0";

/**
 * MCP server exposing the scanner as a tool. `defaultScanFolder` is used when
 * the caller does not name a folder.
 */
export function createServer(scanner: MethodCallScanner, defaultScanFolder: string): McpServer {
  const server = new McpServer(
    {
      name: "java-method-finder",
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.registerTool(
    "find_method_calls",
    {
      description: "Find every place in compiled Java classes (.class files) where a method of a class is called. Matches the class and method name as written in the bytecode; all overloads match, subclasses and overrides are not followed. Returns the calling class, calling method and source line.",
      inputSchema: {
        className: z.string().describe("Fully qualified class that declares the method (e.g. 'java.lang.String')"),
        methodName: z.string().describe("Method name without parameters (e.g. 'toString')"),
        scanFolder: z.string().optional().describe(`Folder with compiled classes. Defaults to ${defaultScanFolder}`),
        format: z.enum(OUTPUT_FORMATS).optional().describe("Result format: 'txt' (default) or 'json'"),
      },
    },
    async ({ className, methodName, scanFolder, format }) => {
      try {
        const result = await scanner.scan({
          root: scanFolder ?? defaultScanFolder,
          className,
          methodName,
        });

        let text = formatResult(result, format ?? "txt");
        if (result.warnings.length > 0) {
          text += `\n\nWarnings (${result.warnings.length} files or methods skipped):\n${formatWarnings(result.warnings)}`;
        }
        return { content: [{ type: "text", text }] };
      } catch (e) {
        return { content: [{ type: "text", text: `Error: ${errorMessage(e)}` }], isError: true };
      }
    }
  );

  return server;
}
