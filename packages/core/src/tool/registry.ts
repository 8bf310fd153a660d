import type { ExecutionContext, ToolCall, ToolDefinition, ToolResult, ToolSchema } from '../types'
import { errorMessage } from '../errors'

/**
 * Manages registered tools and routes model tool calls to them.
 */
export class ToolRegistry {
    private readonly tools = new Map<string, ToolDefinition>()

    register(tool: ToolDefinition): this {
        this.tools.set(tool.schema.name, tool)
        return this
    }

    get(name: string): ToolDefinition | undefined {
        return this.tools.get(name)
    }

    getAll(): ToolDefinition[] {
        return [...this.tools.values()]
    }

    getSchemas(): ToolSchema[] {
        return this.getAll().map((t) => t.schema)
    }

    has(name: string): boolean {
        return this.tools.has(name)
    }

    /**
     * Run a tool call. Never rejects: unknown tools and thrown errors come
     * back as results so the model can react to them.
     */
    async dispatch(call: ToolCall, ctx: ExecutionContext): Promise<ToolResult> {
        const tool = this.tools.get(call.name)
        if (!tool) return toolResult('invalid', `unknown tool "${call.name}"`)

        try {
            return await tool.execute(call.arguments, ctx)
        } catch (err) {
            return toolResult('failed', `${call.name}: ${errorMessage(err)}`)
        }
    }
}

export function toolResult(kind: ToolResult['kind'], message: string): ToolResult {
    return { kind, message }
}

/** Text sent back to the model as the function result. */
export function renderToolResult(result: ToolResult): string {
    switch (result.kind) {
        case 'ok':
        case 'empty':
        case 'truncated':
            return result.message
        default:
            return `Error: ${result.message}`
    }
}

/**
 * Helper to define a tool with full type inference.
 */
export function defineTool(definition: ToolDefinition): ToolDefinition {
    return definition
}
