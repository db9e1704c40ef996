import fs from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { CONFIG } from '../../config/config';
import { ModuleRegistry } from '../../core/modules/ModuleRegistry';
import { RefreshScheduler } from '../../core/modules/RefreshScheduler';
import { Logger } from '../../core/logging/Logger';
import { ToolRateLimiter } from '../../core/security/ToolRateLimiter';
import { handleToolCall, toolDefinitions } from './tools';

async function main() {
    const storageDir = CONFIG.PATHS.STORAGE_DIR;
    fs.mkdirSync(storageDir, { recursive: true });

    const registry = await ModuleRegistry.create(storageDir);
    const scheduler = new RefreshScheduler(registry);
    const rateLimiter = new ToolRateLimiter();

    const server = new Server(
        {
            name: CONFIG.SERVER.NAME,
            version: CONFIG.SERVER.VERSION
        },
        {
            capabilities: {
                tools: {},
            },
        }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: toolDefinitions };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        return await handleToolCall(registry, name, rateLimiter, args);
    });

    server.onerror = (error: Error) => {
        Logger.error('MCP', "[MCP Server Error]", error);
    };

    // Graceful Shutdown
    const cleanup = async () => {
        Logger.info('MCP', 'Shutting down gracefully...');
        scheduler.stop();
        await server.close();
        process.exit(0);
    };
    process.on('SIGINT', () => void cleanup());
    process.on('SIGTERM', () => void cleanup());

    const transport = new StdioServerTransport();
    await server.connect(transport);
    Logger.info('MCP', `Module registry MCP server running on stdio (storage: ${storageDir})`);

    if (CONFIG.REFRESH.INTERVAL_MS > 0) {
        scheduler.start(CONFIG.REFRESH.INTERVAL_MS);
    }
}

main().catch((error) => {
    Logger.error('MCP', "Fatal error in main():", error);
    process.exit(1);
});
