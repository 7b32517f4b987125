import type { Command } from '../types.js';
import { integerOption, parseArgs } from '../utils.js';

export const serveCommand: Command = {
  name: 'serve',
  description: 'Start the HTTP API',
  usage: 'recipe-finder serve [--port <port>]',
  handler: async (args) => {
    const parsed = parseArgs(args, ['--port']);
    const port = integerOption(parsed, '--port');

    const { openRuntime } = await import('../runtime.js');
    const { startServer } = await import('../../api/server.js');
    const { closeDb } = await import('../../storage/db.js');

    const runtime = openRuntime(port === undefined ? undefined : { server: { port } });
    await startServer(
      { pipeline: runtime.pipeline, finder: runtime.finder, defaultLimit: runtime.config.search.limit },
      runtime.config.serverPort,
    );
    closeDb();
  },
};

export const mcpCommand: Command = {
  name: 'mcp',
  description: 'Start the MCP server on stdio',
  usage: 'recipe-finder mcp',
  handler: async () => {
    const { openRuntime } = await import('../runtime.js');
    const { startMcpServer } = await import('../../mcp/server.js');
    const { createTools } = await import('../../mcp/tools.js');
    const { closeDb, getDb } = await import('../../storage/db.js');

    const runtime = openRuntime();
    await startMcpServer({
      tools: createTools(runtime.finder),
      probe: async () => {
        getDb(runtime.config.dbPath).prepare('SELECT 1').get();
        return { database: true, items: await runtime.store.count() };
      },
      onStop: () => closeDb(),
    });
  },
};
