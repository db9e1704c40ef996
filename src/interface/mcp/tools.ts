import { z } from 'zod';
import { ModuleRegistry } from '../../core/modules/ModuleRegistry';
import { ErrorFactory, RegistryError } from '../../core/errors';
import { ToolRateLimiter } from '../../core/security/ToolRateLimiter';

// -------------------------------------------------------------------------
// Validation Schemas
// -------------------------------------------------------------------------
const ModuleIdSchema = z.string().uuid();

const AddModuleSchema = z.object({
    metadataURL: z.string().url()
});

const ModuleIdArgsSchema = z.object({
    id: ModuleIdSchema
});

export type ToolContent = { type: 'text'; text: string };

export type ToolResult = { content: ToolContent[] };

export type ToolDefinition = {
    name: string;
    description: string;
    inputSchema: {
        type: 'object';
        properties: Record<string, { type: string; description: string }>;
        required?: string[];
    };
};

/**
 * The part of the registry the tools drive.
 */
export type ModuleOperations = Pick<ModuleRegistry, 'add' | 'delete' | 'list' | 'getContent' | 'refresh'>;

export const toolDefinitions: ToolDefinition[] = [
    {
        name: "add_module",
        description: "Register a scraping module from its metadata URL and download its script",
        inputSchema: {
            type: "object",
            properties: {
                metadataURL: {
                    type: "string",
                    description: "URL of the module's JSON metadata document"
                }
            },
            required: ["metadataURL"]
        }
    },
    {
        name: "delete_module",
        description: "Remove a module and its cached script",
        inputSchema: {
            type: "object",
            properties: {
                id: { type: "string", description: "Module id returned by add_module or list_modules" }
            },
            required: ["id"]
        }
    },
    {
        name: "list_modules",
        description: "List registered modules as id/name pairs",
        inputSchema: {
            type: "object",
            properties: {}
        }
    },
    {
        name: "get_module_content",
        description: "Return the cached script of a module",
        inputSchema: {
            type: "object",
            properties: {
                id: { type: "string", description: "Module id" }
            },
            required: ["id"]
        }
    },
    {
        name: "refresh_modules",
        description: "Re-fetch every module's metadata and download scripts whose version changed",
        inputSchema: {
            type: "object",
            properties: {}
        }
    }
];

function text(value: string): ToolResult {
    return { content: [{ type: "text", text: value }] };
}

/**
 * Dispatches one MCP tool call to the registry.
 * Throws on unknown tools, invalid arguments, rate limiting and registry errors.
 */
export async function handleToolCall(
    registry: ModuleOperations,
    name: string,
    rateLimiter: ToolRateLimiter,
    args: Record<string, unknown> = {}
): Promise<ToolResult> {
    const decision = rateLimiter.consume(name);
    if (!decision.allowed) {
        const seconds = Math.ceil(decision.retryAfterMs / 1000);
        throw ErrorFactory.validation(`Rate limit exceeded for ${decision.bucket} tools`, {
            code: 'RATE_LIMIT_EXCEEDED',
            suggestion: `Retry in ${seconds}s`
        });
    }

    try {
        if (name === "add_module") {
            const { metadataURL } = AddModuleSchema.parse(args);
            const module = await registry.add(metadataURL);
            return text(JSON.stringify(module, null, 2));
        } else if (name === "delete_module") {
            const { id } = ModuleIdArgsSchema.parse(args);
            await registry.delete(id);
            return text(`Module ${id} deleted`);
        } else if (name === "list_modules") {
            const modules = await registry.list();
            return text(JSON.stringify(modules, null, 2));
        } else if (name === "get_module_content") {
            const { id } = ModuleIdArgsSchema.parse(args);
            return text(await registry.getContent(id));
        } else if (name === "refresh_modules") {
            const summary = await registry.refresh();
            return text(JSON.stringify(summary, null, 2));
        } else {
            throw ErrorFactory.validation(`Unknown tool: ${name}`);
        }
    } catch (err: unknown) {
        if (err instanceof z.ZodError) {
            const issues = err.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
            throw new Error(`Validation Error: ${issues}`);
        }
        const message = err instanceof RegistryError ? err.toUserFriendly() :
            (err instanceof Error ? err.message : String(err));
        throw new Error(`Error executing tool ${name}: ${message}`);
    }
}
