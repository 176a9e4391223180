/**
 * Unit tests for the OpenRouter language model adapter
 */

import { describe, it, expect, vi } from 'vitest';
import {
    OpenRouterLanguageModel,
    decodeToolArguments,
    fromChatResponse,
    toWireMessages,
} from './openrouter-model.js';
import type { ChatOptions, ChatResponse, Message } from '../clients/openrouter.js';
import type { ToolDefinition } from '../tools/types.js';

function chatResponse(
    message: { content: string | null; toolCalls?: { id: string; name: string; arguments: string }[] },
    finishReason: string | null = 'stop'
): ChatResponse {
    return {
        id: 'gen-1',
        choices: [{
            message: { role: 'assistant', content: message.content, toolCalls: message.toolCalls ?? [] },
            finishReason,
        }],
        usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    };
}

const OUTLINE_TOOL: ToolDefinition = {
    name: 'get_course_outline',
    description: 'Outline a course',
    inputSchema: { type: 'object', properties: { course_title: { type: 'string' } }, required: ['course_title'] },
};

describe('decodeToolArguments', () => {
    it('should parse a JSON object', () => {
        expect(decodeToolArguments('{"query":"ml","lesson_number":2}')).toEqual({ query: 'ml', lesson_number: 2 });
    });

    it.each(['', '{not json', '[1,2]', '"text"', 'null'])('should return an empty map for %j', (raw) => {
        expect(decodeToolArguments(raw)).toEqual({});
    });
});

describe('toWireMessages', () => {
    it('should map blocks to assistant tool_calls and tool messages', () => {
        const wire = toWireMessages('system text', [
            { role: 'user', content: 'question' },
            {
                role: 'assistant',
                content: [
                    { type: 'text', text: 'Checking.' },
                    { type: 'tool_use', id: 'call_1', name: 'get_course_outline', input: { course_title: 'RAG' } },
                ],
            },
            { role: 'user', content: [{ type: 'tool_result', toolUseId: 'call_1', content: 'Course: RAG' }] },
            { role: 'assistant', content: 'Let me look up more.' },
        ]);

        expect(wire).toEqual<Message[]>([
            { role: 'system', content: 'system text' },
            { role: 'user', content: 'question' },
            {
                role: 'assistant',
                content: 'Checking.',
                tool_calls: [{
                    id: 'call_1',
                    type: 'function',
                    function: { name: 'get_course_outline', arguments: '{"course_title":"RAG"}' },
                }],
            },
            { role: 'tool', tool_call_id: 'call_1', content: 'Course: RAG' },
            { role: 'assistant', content: 'Let me look up more.' },
        ]);
    });

    it('should send null content for a tool-only assistant turn', () => {
        const wire = toWireMessages('s', [{
            role: 'assistant',
            content: [{ type: 'tool_use', id: 'c', name: 'x', input: {} }],
        }]);

        expect(wire[1]).toEqual({
            role: 'assistant',
            content: null,
            tool_calls: [{ id: 'c', type: 'function', function: { name: 'x', arguments: '{}' } }],
        });
    });
});

describe('fromChatResponse', () => {
    it('should map tool calls to tool_use blocks', () => {
        const response = fromChatResponse(chatResponse(
            { content: null, toolCalls: [{ id: 'call_9', name: 'search_course_content', arguments: '{"query":"agents"}' }] },
            'tool_calls'
        ));

        expect(response).toEqual({
            stopReason: 'tool_use',
            content: [{ type: 'tool_use', id: 'call_9', name: 'search_course_content', input: { query: 'agents' } }],
        });
    });

    it('should map finish reasons without tool calls', () => {
        expect(fromChatResponse(chatResponse({ content: 'Hi' })).stopReason).toBe('end_turn');
        expect(fromChatResponse(chatResponse({ content: 'Hi' }, 'length')).stopReason).toBe('max_tokens');
        expect(fromChatResponse(chatResponse({ content: 'Hi' })).content).toEqual([{ type: 'text', text: 'Hi' }]);
    });

    it('should treat a response with tool calls as tool use whatever the finish reason', () => {
        const response = fromChatResponse(chatResponse(
            { content: 'Searching', toolCalls: [{ id: 'a', name: 'n', arguments: 'oops' }] },
            'stop'
        ));

        expect(response.stopReason).toBe('tool_use');
        expect(response.content[1]).toEqual({ type: 'tool_use', id: 'a', name: 'n', input: {} });
    });
});

describe('OpenRouterLanguageModel', () => {
    it('should send tools with auto choice and sampling settings', async () => {
        const chat = vi.fn<(model: string, messages: Message[], options?: ChatOptions) => Promise<ChatResponse>>()
            .mockResolvedValue(chatResponse({ content: 'Answer' }));
        const model = new OpenRouterLanguageModel({ chat }, { model: 'test/model', temperature: 0, maxTokens: 800 });

        const response = await model.createMessage({
            system: 'sys',
            messages: [{ role: 'user', content: 'q' }],
            tools: [OUTLINE_TOOL],
            toolChoice: { type: 'auto' },
        });

        expect(response.content).toEqual([{ type: 'text', text: 'Answer' }]);
        expect(chat).toHaveBeenCalledWith(
            'test/model',
            [{ role: 'system', content: 'sys' }, { role: 'user', content: 'q' }],
            {
                temperature: 0,
                maxTokens: 800,
                tools: [{
                    type: 'function',
                    function: { name: 'get_course_outline', description: 'Outline a course', parameters: OUTLINE_TOOL.inputSchema },
                }],
                toolChoice: 'auto',
            }
        );
    });

    it('should leave tools off a plain request', async () => {
        const chat = vi.fn<(model: string, messages: Message[], options?: ChatOptions) => Promise<ChatResponse>>()
            .mockResolvedValue(chatResponse({ content: 'Answer' }));
        const model = new OpenRouterLanguageModel({ chat }, { model: 'test/model' });

        await model.createMessage({ system: 'sys', messages: [{ role: 'user', content: 'q' }] });

        const options = chat.mock.calls[0]?.[2];
        expect(options?.tools).toBeUndefined();
        expect(options?.toolChoice).toBeUndefined();
    });
});
