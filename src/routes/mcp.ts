/**
 * MCP (Model Context Protocol) HTTP endpoint.
 *
 * Routes:
 *   POST /api/mcp - JSON-RPC 2.0 endpoint for MCP protocol
 *   GET  /api/mcp - discovery info
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import * as z from 'zod';
import type { ToolHandler } from '../tools.js';
import { ToolInputError } from '../errors.js';

export const SERVER_NAME = 'logseq-outline-mcp';
export const SERVER_VERSION = '0.1.0';
const PROTOCOL_VERSION = '2024-11-05';

const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number()]).nullable().optional(),
  method: z.string(),
  params: z.unknown().optional()
});

type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

const ToolCallParamsSchema = z.object({
  name: z.string(),
  arguments: z.unknown().optional()
});

type JsonRpcId = string | number | null;

interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result?: unknown;
  error?: { code: number; message: string };
}

export const JSON_RPC_ERRORS = {
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internal: -32603
} as const;

function success(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: '2.0', id, result };
}

function failure(id: JsonRpcId, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

export async function handleMcpRequest(request: JsonRpcRequest, tools: Map<string, ToolHandler>): Promise<JsonRpcResponse> {
  const { method, params } = request;
  const id = request.id ?? null;

  try {
    switch (method) {
      // MCP discovery: list available tools
      case 'tools/list': {
        const list = Array.from(tools.values()).map(({ name, description, inputSchema }) => ({ name, description, inputSchema }));
        return success(id, { tools: list });
      }

      // MCP tool invocation
      case 'tools/call': {
        const call = ToolCallParamsSchema.safeParse(params);
        if (!call.success) {
          return failure(id, JSON_RPC_ERRORS.invalidParams, 'tools/call requires a tool name');
        }

        const tool = tools.get(call.data.name);
        if (!tool) {
          return failure(id, JSON_RPC_ERRORS.methodNotFound, `Unknown tool: ${call.data.name}`);
        }

        const text = await tool.run(call.data.arguments);
        return success(id, { content: [{ type: 'text', text }] });
      }

      // MCP initialization (required handshake)
      case 'initialize': {
        return success(id, {
          protocolVersion: PROTOCOL_VERSION,
          capabilities: {
            tools: {}
          },
          serverInfo: {
            name: SERVER_NAME,
            version: SERVER_VERSION
          },
          instructions: 'This server writes markdown into a Logseq graph as nested blocks. Use these tools to create, update, read, search and delete Logseq pages.'
        });
      }

      // Ping for health check
      case 'ping': {
        return success(id, {});
      }

      default:
        return failure(id, JSON_RPC_ERRORS.methodNotFound, `Unknown method: ${method}`);
    }
  } catch (err) {
    if (err instanceof ToolInputError) {
      return failure(id, JSON_RPC_ERRORS.invalidParams, err.message);
    }
    const message = err instanceof Error ? err.message : 'Internal error';
    console.error(`[MCP] ${method} failed: ${message}`);
    return failure(id, JSON_RPC_ERRORS.internal, message);
  }
}

// --- Express Router ---

export function createMcpRouter(toolList: ToolHandler[]): Router {
  const router = Router();
  const tools = new Map(toolList.map(tool => [tool.name, tool]));

  async function handlePost(req: Request, res: Response): Promise<void> {
    const parsed = JsonRpcRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(failure(null, JSON_RPC_ERRORS.invalidRequest, 'Invalid JSON-RPC request'));
      return;
    }

    const request = parsed.data;
    console.log(`[MCP] ${request.method}`, request.params ? JSON.stringify(request.params) : '');

    // Notifications carry no id and get no response body
    if (request.id === undefined) {
      res.status(202).end();
      return;
    }

    const response = await handleMcpRequest(request, tools);
    res.json(response);
  }

  // Main MCP endpoint - handles JSON-RPC requests
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    handlePost(req, res).catch(next);
  });

  // Simple GET for discovery/health check
  router.get('/', (_req: Request, res: Response) => {
    res.json({
      name: SERVER_NAME,
      version: SERVER_VERSION,
      description: 'MCP server that writes markdown into Logseq as block trees',
      tools: toolList.map(t => ({ name: t.name, description: t.description }))
    });
  });

  return router;
}
