export { McpServer, startMcpServer, ErrorCodes, type McpServerConfig, type HealthProbe } from './server.js';
export { createTools, formatMatches, formatRecipe, formatShoppingList, type ToolDefinition } from './tools.js';
