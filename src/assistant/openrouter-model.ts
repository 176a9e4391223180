/**
 * Adapts OpenRouterClient to the block-structured LanguageModel contract.
 */

import type { ChatOptions, ChatResponse, FunctionTool, Message, WireToolCall } from '../clients/openrouter.js';
import type { ToolDefinition } from '../tools/types.js';
import type {
    AssistantBlock,
    ConversationMessage,
    LanguageModel,
    ModelRequest,
    ModelResponse,
    StopReason,
} from './types.js';

/** The slice of OpenRouterClient the adapter uses. */
export interface ChatClient {
    chat(model: string, messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}

export interface OpenRouterModelOptions {
    model: string;
    temperature?: number;
    maxTokens?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Malformed or non-object JSON becomes an empty map. */
export function decodeToolArguments(raw: string): Record<string, unknown> {
    if (!raw.trim()) return {};
    try {
        const parsed: unknown = JSON.parse(raw);
        return isRecord(parsed) ? parsed : {};
    } catch {
        return {};
    }
}

export function toFunctionTool(definition: ToolDefinition): FunctionTool {
    return {
        type: 'function',
        function: {
            name: definition.name,
            description: definition.description,
            parameters: definition.inputSchema,
        },
    };
}

export function toWireMessages(system: string, messages: ConversationMessage[]): Message[] {
    const wire: Message[] = [{ role: 'system', content: system }];

    for (const message of messages) {
        if (message.role === 'user') {
            if (typeof message.content === 'string') {
                wire.push({ role: 'user', content: message.content });
            } else {
                for (const result of message.content) {
                    wire.push({ role: 'tool', tool_call_id: result.toolUseId, content: result.content });
                }
            }
            continue;
        }

        if (typeof message.content === 'string') {
            wire.push({ role: 'assistant', content: message.content });
            continue;
        }

        let text = '';
        const toolCalls: WireToolCall[] = [];
        for (const block of message.content) {
            if (block.type === 'text') {
                text += block.text;
            } else {
                toolCalls.push({
                    id: block.id,
                    type: 'function',
                    function: { name: block.name, arguments: JSON.stringify(block.input) },
                });
            }
        }
        wire.push(toolCalls.length > 0
            ? { role: 'assistant', content: text || null, tool_calls: toolCalls }
            : { role: 'assistant', content: text });
    }

    return wire;
}

function toStopReason(finishReason: string | null, hasToolCalls: boolean): StopReason {
    if (hasToolCalls || finishReason === 'tool_calls') return 'tool_use';
    if (finishReason === 'length') return 'max_tokens';
    return 'end_turn';
}

export function fromChatResponse(response: ChatResponse): ModelResponse {
    const choice = response.choices[0];
    if (!choice) return { stopReason: 'end_turn', content: [] };

    const content: AssistantBlock[] = [];
    if (choice.message.content) {
        content.push({ type: 'text', text: choice.message.content });
    }
    for (const call of choice.message.toolCalls) {
        content.push({ type: 'tool_use', id: call.id, name: call.name, input: decodeToolArguments(call.arguments) });
    }

    return {
        stopReason: toStopReason(choice.finishReason, choice.message.toolCalls.length > 0),
        content,
    };
}

export class OpenRouterLanguageModel implements LanguageModel {
    private client: ChatClient;
    private options: OpenRouterModelOptions;

    constructor(client: ChatClient, options: OpenRouterModelOptions) {
        this.client = client;
        this.options = options;
    }

    async createMessage(request: ModelRequest): Promise<ModelResponse> {
        const chatOptions: ChatOptions = {
            temperature: this.options.temperature,
            maxTokens: this.options.maxTokens,
        };
        if (request.tools && request.tools.length > 0) {
            chatOptions.tools = request.tools.map(toFunctionTool);
            chatOptions.toolChoice = request.toolChoice?.type ?? 'auto';
        }

        const response = await this.client.chat(
            this.options.model,
            toWireMessages(request.system, request.messages),
            chatOptions
        );
        return fromChatResponse(response);
    }
}
