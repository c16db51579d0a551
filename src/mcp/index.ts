/**
 * MCP server for Memoria
 *
 * Lets MCP clients store, recall and curate memories over stdio.
 */

export { runMcpServer, createToolHandler, tools } from './server.js';
export type { ToolHandler, ToolResult } from './server.js';
