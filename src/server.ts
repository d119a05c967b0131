import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as z from 'zod';
import type { QuartoCellConfig } from './config.js';
import { VERSION } from './config.js';
import { checkFile, convertFile } from './cells/api.js';
import { convertMarkdown } from './cells/document.js';
import { convertNav, navEntrySchema } from './cells/nav.js';
import { checkMarkdown } from './cells/validate.js';
import { createLogger, setLogLevel } from './logger.js';

const log = createLogger('server');

const statsSchema = z.object({
  cells: z.number(),
  codeBlocks: z.number(),
  outputs: z.number(),
  normalizedFences: z.number(),
});

const diagnosticSchema = z.object({
  severity: z.enum(['error', 'warning']),
  code: z.string(),
  message: z.string(),
  line: z.number().int().nonnegative().optional(),
});

const checkOutputSchema = {
  errors: z.array(diagnosticSchema),
  warnings: z.array(diagnosticSchema),
};

/**
 * Format a structured result as an MCP tool response.
 */
function toolResult<T extends Record<string, unknown>>(value: T) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
    structuredContent: value,
  };
}

/**
 * Create an MCP server instance and register all tools.
 *
 * Tool naming convention:
 * - `doc.*` works on markdown text passed inline.
 * - `file.*` works on documents under the configured root.
 * - `nav.*` rewrites site navigation entries.
 */
export function createMcpServer(config: QuartoCellConfig): McpServer {
  const server = new McpServer({ name: 'quarto-cell-md-mcp', version: VERSION });

  server.registerTool(
    'doc.convert',
    {
      title: 'Convert rendered Quarto markdown',
      description:
        'Convert markdown produced by `quarto render --to=markdown` into plain code fences and collapsible admonitions.',
      inputSchema: {
        markdown: z.string(),
      },
      outputSchema: {
        markdown: z.string(),
        stats: statsSchema,
      },
    },
    async ({ markdown }) => {
      const converted = convertMarkdown(markdown);
      return toolResult({ markdown: converted.markdown, stats: converted.stats });
    }
  );

  server.registerTool(
    'doc.check',
    {
      title: 'Check rendered Quarto markdown',
      description: 'Report conversion errors and warnings for inline markdown without converting it.',
      inputSchema: {
        markdown: z.string(),
      },
      outputSchema: checkOutputSchema,
    },
    async ({ markdown }) => toolResult({ ...checkMarkdown(markdown) })
  );

  server.registerTool(
    'file.convert',
    {
      title: 'Convert a rendered document file',
      description:
        'Convert a document under the root directory. The output defaults to the same path with a .md extension.',
      inputSchema: {
        path: z.string(),
        outPath: z.string().optional(),
        dryRun: z.boolean().optional(),
        ifMatch: z.string().optional(),
      },
      outputSchema: {
        path: z.string(),
        outPath: z.string(),
        etag: z.string(),
        written: z.boolean(),
        stats: statsSchema,
      },
    },
    async ({ path, outPath, dryRun, ifMatch }) => {
      const result = await convertFile(config, { path, outPath, dryRun, ifMatch });
      return toolResult({
        path: result.path,
        outPath: result.outPath,
        etag: result.etag,
        written: result.written,
        stats: result.stats,
      });
    }
  );

  server.registerTool(
    'file.check',
    {
      title: 'Check a rendered document file',
      description: 'Report conversion errors and warnings for a document under the root directory.',
      inputSchema: {
        path: z.string(),
      },
      outputSchema: checkOutputSchema,
    },
    async ({ path }) => toolResult({ ...(await checkFile(config, { path })) })
  );

  server.registerTool(
    'nav.convert',
    {
      title: 'Convert navigation entries',
      description: 'Rewrite every .qmd page path in a navigation tree to .md.',
      inputSchema: {
        nav: navEntrySchema,
      },
      outputSchema: {
        nav: navEntrySchema,
      },
    },
    async ({ nav }) => toolResult({ nav: convertNav(nav) })
  );

  return server;
}

/**
 * Connect the MCP server to stdio transport and start serving requests.
 *
 * This function does not return until the transport closes.
 */
export async function runStdioServer(config: QuartoCellConfig): Promise<void> {
  setLogLevel(config.logLevel);
  const server = createMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info(`serving documents under ${config.rootDir}`);
}
