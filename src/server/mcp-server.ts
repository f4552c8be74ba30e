/**
 * MCP Server
 *
 * Exposes the renderers as tools over stdio. Log records are forwarded to
 * the client as notifications/message once connected.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SetLevelRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { createErrorResponse, createSuccessResponse, type ToolResponse } from '../shared/errors/index.js';
import {
  getLogger,
  isLogLevel,
  type LogLevel,
  type NotificationSender,
} from '../shared/services/logging.service.js';
import { buildChapterIdMap, renderEpubChapter, renderHtml, renderText } from '../tools/render-tools.js';
import {
  BuildIdMapInputSchema,
  BuildIdMapOutputSchema,
  RenderEpubChapterInputSchema,
  RenderEpubChapterOutputSchema,
  RenderHtmlInputSchema,
  RenderHtmlOutputSchema,
  RenderTextInputSchema,
  RenderTextOutputSchema,
} from '../tools/tool-schemas.js';
import { DEFAULT_SERVER_CONFIG, type ServerConfig } from './types.js';

/**
 * Run a tool handler, timing it and turning any failure into an error
 * response.
 */
export async function executeWithLogging(
  toolName: string,
  handler: () => Record<string, unknown> | Promise<Record<string, unknown>>,
): Promise<ToolResponse> {
  const logger = getLogger();
  const startTime = Date.now();

  try {
    logger.debug(`Executing tool: ${toolName}`);
    const result = await handler();
    logger.debug(`Tool ${toolName} completed in ${Date.now() - startTime}ms`);
    return createSuccessResponse(result);
  } catch (error) {
    logger.error(
      `Tool ${toolName} failed after ${Date.now() - startTime}ms`,
      error instanceof Error ? error : undefined,
      { toolName },
    );
    return createErrorResponse(error);
  }
}

export class TeiRenderServer implements NotificationSender {
  private readonly server: McpServer;
  private readonly transport: StdioServerTransport;

  constructor(private readonly config: ServerConfig = DEFAULT_SERVER_CONFIG) {
    this.server = new McpServer(
      {
        name: config.name,
        version: config.version,
      },
      {
        capabilities: config.capabilities,
      },
    );
    this.transport = new StdioServerTransport();

    this.registerLoggingHandlers();
    this.registerTools();
  }

  async sendLoggingMessage(params: {
    level: LogLevel;
    logger?: string;
    data: Record<string, unknown>;
  }): Promise<void> {
    await this.server.server.notification({
      method: 'notifications/message',
      params: {
        level: params.level,
        logger: params.logger,
        data: params.data,
      },
    });
  }

  private registerLoggingHandlers(): void {
    this.server.server.setRequestHandler(SetLevelRequestSchema, (request) => {
      const logger = getLogger();
      const { level } = request.params;
      if (isLogLevel(level)) {
        logger.setMinLevel(level);
        logger.info(`Log level set to: ${level}`);
      }
      return {};
    });
  }

  private registerTools(): void {
    this.server.registerTool(
      'render_text',
      {
        title: 'Render Plain Text',
        description:
          'Render a TEI document as word-wrapped plain text. Emphasis is marked with underscores, headings are upper-cased.',
        inputSchema: RenderTextInputSchema.shape,
        outputSchema: RenderTextOutputSchema.shape,
      },
      async (input) => executeWithLogging('render_text', () => renderText(input)),
    );

    this.server.registerTool(
      'render_html',
      {
        title: 'Render HTML',
        description:
          'Render a TEI document as a single HTML page with an embedded stylesheet. Set strict to escape all text.',
        inputSchema: RenderHtmlInputSchema.shape,
        outputSchema: RenderHtmlOutputSchema.shape,
      },
      async (input) => executeWithLogging('render_html', () => renderHtml(input)),
    );

    this.server.registerTool(
      'render_epub_chapter',
      {
        title: 'Render EPUB Chapter',
        description:
          'Render one <div> as a strict XHTML chapter file. Pass the idMap from build_id_map to resolve cross-references between chapters.',
        inputSchema: RenderEpubChapterInputSchema.shape,
        outputSchema: RenderEpubChapterOutputSchema.shape,
      },
      async (input) => executeWithLogging('render_epub_chapter', () => renderEpubChapter(input)),
    );

    this.server.registerTool(
      'build_id_map',
      {
        title: 'Build Identifier Map',
        description:
          'Plan the chapter files of a TEI document and map every xml:id to the file that will contain it.',
        inputSchema: BuildIdMapInputSchema.shape,
        outputSchema: BuildIdMapOutputSchema.shape,
      },
      async (input) => executeWithLogging('build_id_map', () => buildChapterIdMap(input)),
    );
  }

  async start(): Promise<void> {
    await this.server.connect(this.transport);
    getLogger().attachNotificationSender(this);
    console.error(`${this.config.name} v${this.config.version} started`);
  }

  async stop(): Promise<void> {
    getLogger().attachNotificationSender(null);
    await this.server.close();
  }
}
