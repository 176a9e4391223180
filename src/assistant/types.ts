/**
 * Language model contract used by the answer loop.
 *
 * The transcript is block-structured: an assistant turn may carry tool_use
 * blocks, and the user turn that follows carries the matching tool_result
 * blocks. Provider adapters translate this to their wire format.
 */

import type { ToolDefinition } from '../tools/types.js';

export interface TextBlock {
    type: 'text';
    text: string;
}

export interface ToolUseBlock {
    type: 'tool_use';
    id: string;
    name: string;
    input: Record<string, unknown>;
}

export interface ToolResultBlock {
    type: 'tool_result';
    toolUseId: string;
    content: string;
}

export type AssistantBlock = TextBlock | ToolUseBlock;

export type ConversationMessage =
    | { role: 'user'; content: string | ToolResultBlock[] }
    | { role: 'assistant'; content: string | AssistantBlock[] };

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | 'stop_sequence';

export interface ToolChoice {
    type: 'auto';
}

export interface ModelRequest {
    system: string;
    messages: ConversationMessage[];
    /** Omit to force a plain-text answer. */
    tools?: ToolDefinition[];
    toolChoice?: ToolChoice;
}

export interface ModelResponse {
    stopReason: StopReason;
    content: AssistantBlock[];
}

export interface LanguageModel {
    createMessage(request: ModelRequest): Promise<ModelResponse>;
}

export function isToolUse(block: AssistantBlock): block is ToolUseBlock {
    return block.type === 'tool_use';
}

export function responseText(response: ModelResponse): string {
    return response.content
        .filter((block): block is TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('');
}
