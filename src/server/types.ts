/**
 * Server Types
 *
 * Core types for server orchestration
 */

/**
 * MCP Server configuration
 */
export interface ServerConfig {
  name: string;
  version: string;
  capabilities: {
    tools?: Record<string, unknown>;
    logging?: Record<string, unknown>;
  };
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  name: 'tei-render',
  version: '1.0.0',
  capabilities: {
    tools: {},
    logging: {},
  },
};
