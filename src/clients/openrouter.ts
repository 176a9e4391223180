/**
 * OpenRouter API Client
 * OpenAI-compatible chat completions with function calling
 */

import { z } from 'zod';
import { ApiKeyError, CourseAssistantError, ModelApiError, RateLimitError } from '../errors.js';

const OPENROUTER_API_BASE = 'https://openrouter.ai/api/v1';
const DEFAULT_CHAT_TIMEOUT_MS = 60_000;

function createTimeoutSignal(timeoutMs: number, parentSignal?: AbortSignal): { signal: AbortSignal; cleanup: () => void } {
    const controller = new AbortController();
    const onAbort = () => controller.abort();

    if (parentSignal) {
        if (parentSignal.aborted) {
            controller.abort();
        } else {
            parentSignal.addEventListener('abort', onAbort, { once: true });
        }
    }

    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    return {
        signal: controller.signal,
        cleanup: () => {
            clearTimeout(timeoutId);
            if (parentSignal && !parentSignal.aborted) {
                parentSignal.removeEventListener('abort', onAbort);
            }
        },
    };
}

function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

function isAbortError(error: Error): boolean {
    return error.name === 'AbortError';
}

function abortError(): Error {
    const error = new Error('This operation was aborted');
    error.name = 'AbortError';
    return error;
}

/**
 * Reads the response body, giving up as soon as `signal` aborts.
 */
function readBody(response: Response, signal: AbortSignal): Promise<string> {
    if (signal.aborted) return Promise.reject(abortError());
    return new Promise<string>((resolve, reject) => {
        const onAbort = () => reject(abortError());
        signal.addEventListener('abort', onAbort, { once: true });
        void response.text().then(
            (text) => {
                signal.removeEventListener('abort', onAbort);
                resolve(text);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(toError(error));
            }
        );
    });
}

export interface WireToolCall {
    id: string;
    type: 'function';
    function: {
        name: string;
        /** JSON-encoded argument object. */
        arguments: string;
    };
}

export type Message =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string }
    | { role: 'assistant'; content: string | null; tool_calls?: WireToolCall[] }
    | { role: 'tool'; tool_call_id: string; content: string };

export interface FunctionTool {
    type: 'function';
    function: {
        name: string;
        description: string;
        parameters: object;
    };
}

export interface ChatOptions {
    tools?: FunctionTool[];
    toolChoice?: 'auto' | 'none';
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
}

export interface ToolCall {
    id: string;
    name: string;
    /** Raw JSON as sent by the model; may be malformed. */
    arguments: string;
}

export interface ChatResponse {
    id: string;
    choices: {
        message: {
            role: string;
            content: string | null;
            toolCalls: ToolCall[];
        };
        finishReason: string | null;
    }[];
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
}

export interface OpenRouterClientOptions {
    timeoutMs?: number;
    baseUrl?: string;
}

const ChatCompletionSchema = z.object({
    id: z.string().default(''),
    choices: z.array(z.object({
        message: z.object({
            role: z.string().default('assistant'),
            content: z.string().nullish(),
            tool_calls: z.array(z.object({
                id: z.string(),
                function: z.object({
                    name: z.string(),
                    arguments: z.string().nullish(),
                }),
            })).nullish(),
        }),
        finish_reason: z.string().nullish(),
    })).min(1),
    usage: z.object({
        prompt_tokens: z.number().optional(),
        completion_tokens: z.number().optional(),
        total_tokens: z.number().optional(),
    }).nullish(),
});

const ErrorBodySchema = z.object({
    error: z.union([z.string(), z.object({ message: z.string() })]).optional(),
    message: z.string().optional(),
});

function retryAfterMs(response: Response): number | undefined {
    const value = response.headers?.get('retry-after');
    if (!value) return undefined;
    const seconds = Number(value);
    return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : undefined;
}

export class OpenRouterClient {
    private apiKey: string;
    private timeoutMs: number;
    private baseUrl: string;

    constructor(apiKey: string, options: OpenRouterClientOptions = {}) {
        if (!apiKey || apiKey.trim() === '') {
            throw new ApiKeyError(
                'OPENROUTER_API_KEY',
                'OPENROUTER_API_KEY is required.\n' +
                'Get your API key at: https://openrouter.ai\n' +
                'Then run: course-assistant init',
                'https://openrouter.ai'
            );
        }
        this.apiKey = apiKey.trim();
        this.timeoutMs = options.timeoutMs ?? DEFAULT_CHAT_TIMEOUT_MS;
        this.baseUrl = options.baseUrl ?? OPENROUTER_API_BASE;
    }

    /**
     * Parse API error response for better error messages
     */
    private async parseError(response: Response, signal: AbortSignal): Promise<string> {
        let text: string;
        try {
            text = await readBody(response, signal);
        } catch {
            return `HTTP ${response.status}`;
        }

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch {
            return text;
        }

        const parsed = ErrorBodySchema.safeParse(json);
        if (!parsed.success) return text;
        const { error, message } = parsed.data;
        if (typeof error === 'object') return error.message;
        return error || message || text;
    }

    private async throwForStatus(response: Response, signal: AbortSignal): Promise<never> {
        const detail = await this.parseError(response, signal);

        if (response.status === 401) {
            throw new ApiKeyError(
                'OPENROUTER_API_KEY',
                'OpenRouter API authentication failed.\n' +
                'Please check your OPENROUTER_API_KEY is valid.\n' +
                'Run: course-assistant init'
            );
        }
        if (response.status === 429) {
            throw new RateLimitError('OpenRouter', retryAfterMs(response));
        }

        throw new ModelApiError(response.status, detail);
    }

    /**
     * Single attempt. The deadline covers the body as well as the headers,
     * which arrive long before a non-streamed completion does.
     */
    private async post(
        path: string,
        body: Record<string, unknown>,
        parentSignal?: AbortSignal
    ): Promise<{ status: number; raw: string }> {
        const { signal, cleanup } = createTimeoutSignal(this.timeoutMs, parentSignal);
        try {
            const response = await fetch(`${this.baseUrl}${path}`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${this.apiKey}`,
                    'X-Title': 'Course Assistant',
                },
                body: JSON.stringify(body),
                signal,
            });

            if (!response.ok) {
                return await this.throwForStatus(response, signal);
            }
            return { status: response.status, raw: await readBody(response, signal) };
        } catch (error) {
            const err = toError(error);
            if (isAbortError(err)) {
                throw new CourseAssistantError(`OpenRouter request timed out after ${this.timeoutMs}ms`);
            }
            throw err;
        } finally {
            cleanup();
        }
    }

    /**
     * Send a chat completion request (non-streaming)
     */
    async chat(
        model: string,
        messages: Message[],
        options: ChatOptions = {}
    ): Promise<ChatResponse> {
        const body: Record<string, unknown> = {
            model,
            messages,
            stream: false,
        };
        if (options.tools && options.tools.length > 0) {
            body.tools = options.tools;
            body.tool_choice = options.toolChoice ?? 'auto';
        }
        if (typeof options.temperature === 'number') body.temperature = options.temperature;
        if (typeof options.maxTokens === 'number') body.max_tokens = options.maxTokens;

        const { status, raw } = await this.post('/chat/completions', body, options.signal);

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            throw new ModelApiError(status, `Malformed completion: ${toError(error).message}`);
        }

        const parsed = ChatCompletionSchema.safeParse(json);
        if (!parsed.success) {
            const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
            throw new ModelApiError(status, `Malformed completion: ${issues}`);
        }

        const data = parsed.data;
        return {
            id: data.id,
            choices: data.choices.map((choice) => ({
                message: {
                    role: choice.message.role,
                    content: choice.message.content ?? null,
                    toolCalls: (choice.message.tool_calls ?? []).map((call) => ({
                        id: call.id,
                        name: call.function.name,
                        arguments: call.function.arguments ?? '',
                    })),
                },
                finishReason: choice.finish_reason ?? null,
            })),
            usage: {
                promptTokens: data.usage?.prompt_tokens || 0,
                completionTokens: data.usage?.completion_tokens || 0,
                totalTokens: data.usage?.total_tokens || 0,
            },
        };
    }
}
