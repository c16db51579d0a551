/**
 * Memoria MCP Server
 *
 * Exposes the memory engine to MCP-compatible clients over stdio, so an
 * assistant can store, recall and curate user memories without the CLI.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { findProjectRoot, getMemoryDbPath, initProject, loadConfig } from '../config/index.js';
import type { MemoryOrchestrator } from '../core/orchestrator.js';
import { createMemorySystem } from '../core/system.js';
import { errorMessage } from '../errors.js';
import type { MemoryRecord, RankedMemory } from '../memory/types.js';
import { createLogger } from '../utils/logger.js';

// Tool input schemas
const MAX_CONTENT_LENGTH = 2000;
const MAX_QUERY_LENGTH = 500;

const MemoryAddSchema = z.object({
  content: z.string().trim().min(1).max(MAX_CONTENT_LENGTH),
  importance: z.number().int().min(1).max(10).optional(),
  category: z.string().max(100).optional(),
  entities: z.array(z.string().max(200)).max(50).optional(),
});

const MemoryQuerySchema = z.object({
  query: z.string().trim().min(1).max(MAX_QUERY_LENGTH),
  limit: z.number().int().min(1).max(50).optional().default(5),
});

const MemoryListSchema = z.object({
  limit: z.number().int().min(1).max(100).optional().default(20),
});

const MemoryDeleteSchema = z.object({
  id: z.number().int().positive(),
});

const MemoryProcessSchema = z.object({
  conversation: z.array(z.object({
    role: z.enum(['system', 'user', 'assistant']),
    content: z.string().max(20000),
  })).min(1).max(200),
  extract: z.boolean().optional().default(true),
  curate: z.boolean().optional().default(true),
  limit: z.number().int().min(1).max(50).optional(),
});

export const tools = [
  {
    name: 'memory_add',
    description: `Store a long-term memory about the user.

Use this when the user shares a lasting preference, fact or piece of personal information.`,
    inputSchema: {
      type: 'object' as const,
      properties: {
        content: { type: 'string', description: 'The memory content' },
        importance: { type: 'number', description: 'Importance from 1 to 10' },
        category: { type: 'string', description: 'e.g. preference, fact, personal_info' },
        entities: { type: 'array', items: { type: 'string' }, description: 'Entities mentioned' },
      },
      required: ['content'],
    },
  },
  {
    name: 'memory_relevant',
    description: `Get the stored memories most relevant to a query, ranked by semantic similarity.

Call this before answering a question that may depend on what you know about the user.`,
    inputSchema: {
      type: 'object' as const,
      properties: {
        query: { type: 'string', description: 'What the user is asking about' },
        limit: { type: 'number', description: 'Max results (default 5)' },
      },
      required: ['query'],
    },
  },
  {
    name: 'memory_search',
    description: 'Find memories whose text contains the query (case-insensitive).',
    inputSchema: {
      type: 'object' as const,
      properties: {
        query: { type: 'string', description: 'Text to look for' },
        limit: { type: 'number', description: 'Max results (default 5)' },
      },
      required: ['query'],
    },
  },
  {
    name: 'memory_list',
    description: 'List stored memories, newest first.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        limit: { type: 'number', description: 'Max results (default 20)' },
      },
      required: [],
    },
  },
  {
    name: 'memory_delete',
    description: 'Permanently delete a memory by id.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        id: { type: 'number', description: 'Memory id' },
      },
      required: ['id'],
    },
  },
  {
    name: 'memory_process',
    description: `Run memory upkeep over a conversation.

Extracts new memories, deletes memories the conversation invalidates, and returns
the memories relevant to the latest user message.`,
    inputSchema: {
      type: 'object' as const,
      properties: {
        conversation: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              role: { type: 'string', enum: ['system', 'user', 'assistant'] },
              content: { type: 'string' },
            },
            required: ['role', 'content'],
          },
        },
        extract: { type: 'boolean', description: 'Extract new memories (default true)' },
        curate: { type: 'boolean', description: 'Delete invalidated memories (default true)' },
        limit: { type: 'number', description: 'Max relevant memories' },
      },
      required: ['conversation'],
    },
  },
];

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export type ToolHandler = (name: string, args: unknown) => Promise<ToolResult>;

function text(value: string, isError = false): ToolResult {
  const result: ToolResult = { content: [{ type: 'text', text: value }] };
  if (isError) result.isError = true;
  return result;
}

function describeMemory(memory: MemoryRecord): string {
  const { importance, category } = memory.metadata;
  const tags = [
    category,
    importance !== undefined ? `importance ${importance}` : undefined,
  ].filter((tag): tag is string => tag !== undefined);

  return `[${memory.id}] ${memory.content}${tags.length > 0 ? ` (${tags.join(', ')})` : ''}`;
}

function describeRanked(ranked: RankedMemory): string {
  return `${describeMemory(ranked.memory)} - ${(ranked.similarity * 100).toFixed(0)}% match`;
}

/**
 * Dispatch tool calls against an orchestrator. Validation and engine errors
 * come back as isError results rather than protocol errors.
 */
export function createToolHandler(orchestrator: MemoryOrchestrator): ToolHandler {
  return async (name, args) => {
    try {
      switch (name) {
        case 'memory_add': {
          const input = MemoryAddSchema.parse(args ?? {});
          const memory = await orchestrator.addMemory(input.content, {
            importance: input.importance,
            category: input.category,
            entities: input.entities,
          });
          return text(`✓ Stored memory ${memory.id}: "${memory.content}"`);
        }

        case 'memory_relevant': {
          const input = MemoryQuerySchema.parse(args ?? {});
          const results = await orchestrator.getRelevantMemories(input.query, input.limit);
          if (results.length === 0) {
            return text('No memories stored yet.');
          }
          return text(results.map(describeRanked).join('\n'));
        }

        case 'memory_search': {
          const input = MemoryQuerySchema.parse(args ?? {});
          const results = await orchestrator.searchByContent(input.query, input.limit);
          if (results.length === 0) {
            return text(`No memories found containing "${input.query}"`);
          }
          return text(results.map(describeMemory).join('\n'));
        }

        case 'memory_list': {
          const input = MemoryListSchema.parse(args ?? {});
          const memories = await orchestrator.listMemories();
          if (memories.length === 0) {
            return text('No memories stored yet.');
          }
          const shown = memories.slice(0, input.limit);
          return text(
            `${memories.length} memories${shown.length < memories.length ? ` (showing ${shown.length})` : ''}:\n` +
            shown.map(describeMemory).join('\n')
          );
        }

        case 'memory_delete': {
          const input = MemoryDeleteSchema.parse(args ?? {});
          const deleted = await orchestrator.deleteMemory(input.id);
          return deleted
            ? text(`✓ Deleted memory ${input.id}`)
            : text(`Memory not found: ${input.id}`, true);
        }

        case 'memory_process': {
          const input = MemoryProcessSchema.parse(args ?? {});
          const result = await orchestrator.process(input.conversation, {
            extract: input.extract,
            curate: input.curate,
            limit: input.limit,
          });

          const sections = [
            `Added (${result.newMemories.length}):`,
            ...result.newMemories.map(describeMemory),
            `Deleted (${result.deletedMemories.length}): ${result.deletedMemories.join(', ')}`.trimEnd(),
            `Relevant (${result.relevantMemories.length}):`,
            ...result.relevantMemories.map(describeRanked),
          ];
          return text(sections.join('\n'));
        }

        default:
          return text(`Unknown tool: ${name}`, true);
      }
    } catch (error) {
      if (error instanceof z.ZodError) {
        const issue = error.issues[0];
        return text(`Invalid input: ${issue ? `${issue.path.join('.') || 'arguments'}: ${issue.message}` : 'validation failed'}`, true);
      }
      return text(`Error: ${errorMessage(error)}`, true);
    }
  };
}

/**
 * Initialize and run the MCP server
 */
export async function runMcpServer(): Promise<void> {
  let projectRoot = findProjectRoot();
  if (!projectRoot) {
    projectRoot = process.cwd();
    initProject(projectRoot);
  }

  const config = loadConfig(projectRoot);
  // stdout carries the protocol; logs stay on stderr
  const logger = createLogger({ level: config.logging.level, scope: 'mcp' });
  const system = await createMemorySystem(config, {
    dbPath: getMemoryDbPath(projectRoot),
    env: process.env,
    logger,
  });

  const handleTool = createToolHandler(system.orchestrator);

  const server = new Server(
    {
      name: 'memoria',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleTool(name, args);
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`Serving memories from ${projectRoot}`);

  const shutdown = (): void => {
    system.close();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
