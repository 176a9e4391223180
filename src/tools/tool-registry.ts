/**
 * Tool Registry
 *
 * Holds tools by the name their own definition declares, dispatches calls by
 * name and keeps the attribution of whichever tool most recently produced
 * sources. Call reset() once a query's sources have been harvested.
 */

import { ConfigError } from '../errors.js';
import type { SourceAttribution, Tool, ToolArguments, ToolDefinition, ToolDispatcher } from './types.js';

export class ToolRegistry implements ToolDispatcher {
    private tools = new Map<string, Tool>();
    private lastAttribution: SourceAttribution[] = [];

    register(tool: Tool): void {
        const name = tool.definition().name;
        if (!name) {
            throw new ConfigError("Tool must have a 'name' in its definition");
        }
        this.tools.set(name, tool);
    }

    /**
     * Registration order.
     */
    definitions(): ToolDefinition[] {
        return Array.from(this.tools.values(), (tool) => tool.definition());
    }

    /**
     * Unknown names come back as text, never as an exception. Errors thrown by
     * the tool itself propagate to the caller.
     */
    async dispatch(name: string, args: ToolArguments): Promise<string> {
        const tool = this.tools.get(name);
        if (!tool) return `Tool '${name}' not found`;

        const result = await tool.execute(args);
        if (result.sources.length > 0) {
            this.lastAttribution = [...result.sources];
        }
        return result.text;
    }

    lastSourceAttribution(): SourceAttribution[] {
        return [...this.lastAttribution];
    }

    lastSources(): string[] {
        return this.lastAttribution.map((source) => source.label);
    }

    lastSourceLinks(): (string | null)[] {
        return this.lastAttribution.map((source) => source.link);
    }

    reset(): void {
        this.lastAttribution = [];
    }
}
