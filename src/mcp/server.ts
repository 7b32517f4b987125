/**
 * MCP (Model Context Protocol) server for recipe tools.
 *
 * Features:
 * - Health check endpoint (ping)
 * - Structured JSON logging
 * - Graceful shutdown handling
 * - Standardized error responses
 * - Optional token-based authentication
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { ToolDefinition } from './tools.js';
import { errorMessage } from '../utils/errors.js';
import { VERSION } from '../utils/version.js';

type McpLogLevel = 'debug' | 'info' | 'warn' | 'error';
const LOG_LEVELS: readonly McpLogLevel[] = ['debug', 'info', 'warn', 'error'];

/** Database and index figures reported by `health`. */
export interface HealthProbe {
  database: boolean;
  items: number;
}

/** MCP Server configuration */
export interface McpServerConfig {
  /** Tools exposed through tools/list and tools/call */
  tools: ToolDefinition[];
  /** Enable structured JSON logging */
  enableLogging?: boolean;
  /** Log level: 'debug' | 'info' | 'warn' | 'error' */
  logLevel?: McpLogLevel;
  /** Authentication token (if set, every request but initialize must carry it in `_auth`) */
  authToken?: string;
  /** Enable health check endpoint */
  enableHealthCheck?: boolean;
  /** Reports storage health */
  probe?: () => Promise<HealthProbe>;
  /** Releases resources on stop */
  onStop?: () => Promise<void> | void;
  input?: Readable;
  output?: Writable;
}

/** Log entry structure */
interface LogEntry {
  timestamp: string;
  level: McpLogLevel;
  event: string;
  requestId?: string | number;
  method?: string;
  durationMs?: number;
  error?: string;
  details?: Record<string, unknown>;
}

/** Standard error codes */
export const ErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  UNAUTHORIZED: -32001,
  TOOL_ERROR: -32002,
} as const;

type RequestId = string | number;

/**
 * MCP request message.
 */
export interface McpRequest {
  jsonrpc: '2.0';
  id: RequestId;
  method: string;
  params?: Record<string, unknown>;
}

/**
 * MCP response message.
 */
export interface McpResponse {
  jsonrpc: '2.0';
  id: RequestId | null;
  result?: unknown;
  error?: {
    code: number;
    message: string;
    data?: unknown;
  };
}

/**
 * Health check response.
 */
export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptime: number;
  checks: {
    database: boolean;
    index: boolean;
  };
  stats: {
    items: number;
  };
}

/**
 * Create a standardized error response.
 */
function createErrorResponse(
  id: RequestId | null,
  code: number,
  message: string,
  data?: unknown,
): McpResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: { code, message, data },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRequest(value: unknown): McpRequest | null {
  if (!isRecord(value) || value.jsonrpc !== '2.0' || typeof value.method !== 'string') {
    return null;
  }
  const { id, params } = value;
  if (typeof id !== 'string' && typeof id !== 'number') return null;
  if (params !== undefined && !isRecord(params)) return null;
  return { jsonrpc: '2.0', id, method: value.method, params };
}

function readLogLevel(value: string | undefined): McpLogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value);
}

/**
 * Handle MCP requests via JSON-RPC over stdio.
 */
export class McpServer {
  private running = false;
  private startTime = Date.now();
  private readonly config: Required<Omit<McpServerConfig, 'probe' | 'onStop'>> &
    Pick<McpServerConfig, 'probe' | 'onStop'>;
  private requestCount = 0;
  private errorCount = 0;

  constructor(config: McpServerConfig) {
    this.config = {
      tools: config.tools,
      enableLogging: config.enableLogging ?? process.env.RECIPE_FINDER_MCP_LOGGING === 'true',
      logLevel: config.logLevel ?? readLogLevel(process.env.RECIPE_FINDER_MCP_LOG_LEVEL) ?? 'info',
      authToken: config.authToken ?? process.env.RECIPE_FINDER_MCP_AUTH_TOKEN ?? '',
      enableHealthCheck: config.enableHealthCheck ?? true,
      probe: config.probe,
      onStop: config.onStop,
      input: config.input ?? process.stdin,
      output: config.output ?? process.stdout,
    };
  }

  /**
   * Log a structured message.
   */
  private log(entry: Omit<LogEntry, 'timestamp'>): void {
    if (!this.config.enableLogging) return;

    if (LOG_LEVELS.indexOf(entry.level) < LOG_LEVELS.indexOf(this.config.logLevel)) return;

    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      ...entry,
    };

    // stderr, so the protocol stream stays clean
    process.stderr.write(JSON.stringify(logEntry) + '\n');
  }

  private send(response: McpResponse): void {
    this.config.output.write(JSON.stringify(response) + '\n');
  }

  /**
   * Start reading requests. Resolves immediately; the server runs until
   * input closes or `shutdown` is received.
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.startTime = Date.now();

    this.log({ level: 'info', event: 'server_started' });

    const rl = createInterface({
      input: this.config.input,
      terminal: false,
    });

    rl.on('line', (line) => {
      if (line.trim().length === 0) return;
      this.handleLine(line).then(
        (response) => this.send(response),
        (error: unknown) => {
          this.log({ level: 'error', event: 'unhandled_error', error: errorMessage(error) });
        },
      );
    });

    rl.on('close', () => {
      this.log({ level: 'info', event: 'stdin_closed' });
      this.stop().catch((error: unknown) => {
        this.log({ level: 'error', event: 'shutdown_error', error: errorMessage(error) });
      });
    });
  }

  /**
   * Parse and answer one line of input.
   */
  async handleLine(line: string): Promise<McpResponse> {
    const startTime = Date.now();
    this.requestCount++;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      this.errorCount++;
      this.log({ level: 'error', event: 'parse_error', error: errorMessage(error) });
      return createErrorResponse(null, ErrorCodes.PARSE_ERROR, 'Parse error', errorMessage(error));
    }

    const request = toRequest(parsed);
    if (!request) {
      this.errorCount++;
      return createErrorResponse(null, ErrorCodes.INVALID_REQUEST, 'Invalid Request');
    }

    this.log({ level: 'debug', event: 'request_received', requestId: request.id, method: request.method });
    const response = await this.handleRequest(request);
    this.log({
      level: 'debug',
      event: 'request_completed',
      requestId: request.id,
      method: request.method,
      durationMs: Date.now() - startTime,
    });
    return response;
  }

  /**
   * Stop the MCP server gracefully.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    this.log({
      level: 'info',
      event: 'server_stopping',
      details: {
        uptime: Date.now() - this.startTime,
        requestCount: this.requestCount,
        errorCount: this.errorCount,
      },
    });

    await this.config.onStop?.();
    this.log({ level: 'info', event: 'server_stopped' });
  }

  /**
   * Check authentication if configured.
   */
  private checkAuth(params?: Record<string, unknown>): boolean {
    if (!this.config.authToken) return true;
    return params?._auth === this.config.authToken;
  }

  /**
   * Handle a single MCP request.
   */
  async handleRequest(request: McpRequest): Promise<McpResponse> {
    const { id, method, params } = request;

    if (method !== 'initialize' && !this.checkAuth(params)) {
      this.log({ level: 'warn', event: 'auth_failed', requestId: id, method });
      return createErrorResponse(id, ErrorCodes.UNAUTHORIZED, 'Unauthorized');
    }

    try {
      switch (method) {
        case 'initialize':
          return this.handleInitialize(id);

        case 'tools/list':
          return this.handleToolsList(id);

        case 'tools/call':
          return await this.handleToolsCall(id, params ?? {});

        case 'ping':
          return this.handlePing(id);

        case 'health':
          return await this.handleHealth(id);

        case 'shutdown':
          await this.stop();
          return { jsonrpc: '2.0', id, result: null };

        default:
          return createErrorResponse(id, ErrorCodes.METHOD_NOT_FOUND, `Method not found: ${method}`);
      }
    } catch (error) {
      this.errorCount++;
      this.log({ level: 'error', event: 'request_error', requestId: id, method, error: errorMessage(error) });
      return createErrorResponse(id, ErrorCodes.INTERNAL_ERROR, 'Internal error', errorMessage(error));
    }
  }

  private handlePing(id: RequestId): McpResponse {
    return {
      jsonrpc: '2.0',
      id,
      result: { pong: true, timestamp: Date.now() },
    };
  }

  private async handleHealth(id: RequestId): Promise<McpResponse> {
    if (!this.config.enableHealthCheck) {
      return createErrorResponse(id, ErrorCodes.METHOD_NOT_FOUND, 'Health check disabled');
    }

    let probe: HealthProbe = { database: false, items: 0 };
    if (this.config.probe) {
      try {
        probe = await this.config.probe();
      } catch (error) {
        this.log({ level: 'warn', event: 'health_probe_failed', requestId: id, error: errorMessage(error) });
      }
    }
    const indexOk = probe.items > 0;

    const status: HealthStatus = {
      status: probe.database && indexOk ? 'healthy' : probe.database ? 'degraded' : 'unhealthy',
      version: VERSION,
      uptime: Date.now() - this.startTime,
      checks: {
        database: probe.database,
        index: indexOk,
      },
      stats: {
        items: probe.items,
      },
    };

    return { jsonrpc: '2.0', id, result: status };
  }

  private handleInitialize(id: RequestId): McpResponse {
    return {
      jsonrpc: '2.0',
      id,
      result: {
        protocolVersion: '2024-11-05',
        capabilities: {
          tools: {},
        },
        serverInfo: {
          name: 'recipe-finder',
          version: VERSION,
        },
      },
    };
  }

  private handleToolsList(id: RequestId): McpResponse {
    const toolList = this.config.tools.map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.inputSchema,
    }));

    return { jsonrpc: '2.0', id, result: { tools: toolList } };
  }

  private async handleToolsCall(id: RequestId, params: Record<string, unknown>): Promise<McpResponse> {
    const { name } = params;
    if (typeof name !== 'string') {
      return createErrorResponse(id, ErrorCodes.INVALID_PARAMS, 'Missing tool name');
    }
    const args = params.arguments ?? {};
    if (!isRecord(args)) {
      return createErrorResponse(id, ErrorCodes.INVALID_PARAMS, 'Tool arguments must be an object');
    }

    const tool = this.config.tools.find((t) => t.name === name);
    if (!tool) {
      return createErrorResponse(id, ErrorCodes.INVALID_PARAMS, `Unknown tool: ${name}`);
    }

    const startTime = Date.now();

    try {
      const result = await tool.handler(args);

      this.log({
        level: 'info',
        event: 'tool_executed',
        requestId: id,
        details: { tool: name, durationMs: Date.now() - startTime },
      });

      return {
        jsonrpc: '2.0',
        id,
        result: {
          content: [{ type: 'text', text: result }],
        },
      };
    } catch (error) {
      this.log({
        level: 'error',
        event: 'tool_error',
        requestId: id,
        details: { tool: name },
        error: errorMessage(error),
      });

      return createErrorResponse(id, ErrorCodes.TOOL_ERROR, `Tool '${name}' failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Get server statistics.
   */
  getStats(): { requestCount: number; errorCount: number; uptime: number } {
    return {
      requestCount: this.requestCount,
      errorCount: this.errorCount,
      uptime: Date.now() - this.startTime,
    };
  }
}

/**
 * Create and start the MCP server.
 */
export async function startMcpServer(config: McpServerConfig): Promise<McpServer> {
  const server = new McpServer(config);
  await server.start();
  return server;
}
