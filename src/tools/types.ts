/**
 * Tool contract shared by the retrieval tools, the registry and the answer loop.
 */

export interface JsonSchemaProperty {
    type: 'string' | 'integer' | 'number' | 'boolean';
    description?: string;
}

export interface ToolInputSchema {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required?: string[];
}

/** Static description of a callable tool, handed to the model on every tools-enabled call. */
export interface ToolDefinition {
    name: string;
    description: string;
    inputSchema: ToolInputSchema;
}

/** A human-readable source label with the lesson link it came from, when one exists. */
export interface SourceAttribution {
    label: string;
    link: string | null;
}

export interface ToolResult {
    text: string;
    sources: SourceAttribution[];
}

export type ToolArguments = Record<string, unknown>;

export interface Tool {
    definition(): ToolDefinition;
    execute(args: ToolArguments): Promise<ToolResult>;
}

/** What the answer loop needs from a registry: dispatch by name, text back. */
export interface ToolDispatcher {
    dispatch(name: string, args: ToolArguments): Promise<string>;
}
