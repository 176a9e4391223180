/**
 * Answer Generator - bounded multi-round tool-calling loop
 *
 * Each round makes one tools-enabled model call. If the model asks for tools,
 * every call runs in emission order, the results go back to the model, and a
 * second call without tools produces the round's follow-up text. The
 * continuation policy then decides whether that text ends the query or earns
 * another round. Running out of rounds without a clean stop ends in synthesis
 * over the accumulated tool results.
 */

import type { Logger } from '../utils/logger.js';
import { makeLogger } from '../utils/logger.js';
import type { ToolDefinition, ToolDispatcher } from '../tools/types.js';
import { ConversationState, DEFAULT_MAX_ROUNDS } from './conversation-state.js';
import { phraseContinuationPolicy, type ContinuationPolicy } from './continuation.js';
import {
    NO_CONTEXT_APOLOGY,
    SYNTHESIS_FALLBACK_PREFIX,
    SYNTHESIS_SYSTEM_PROMPT,
    SYSTEM_PROMPT,
    buildInitialSystemPrompt,
    buildRoundSystemPrompt,
    buildSynthesisPrompt,
} from './prompts.js';
import {
    isToolUse,
    responseText,
    type LanguageModel,
    type ModelRequest,
    type ModelResponse,
    type ToolResultBlock,
    type ToolUseBlock,
} from './types.js';

/** How the loop ended. */
export type Termination =
    | 'direct'       // model answered without tools
    | 'complete'     // follow-up text after tool use read as finished
    | 'synthesized'  // synthesis call over the accumulated context
    | 'apology'      // nothing gathered; fixed apology
    | 'raw-context'; // synthesis call failed; context returned as-is

export interface GenerationOutcome {
    answer: string;
    termination: Termination;
    roundsUsed: number;
    toolCalls: number;
}

export interface AnswerGeneratorOptions {
    maxRounds?: number;
    systemPrompt?: string;
    continuationPolicy?: ContinuationPolicy;
    logger?: Logger;
}

export interface AnswerOptions {
    /** Pre-formatted prior turns, injected verbatim into round 1's system prompt. */
    conversationHistory?: string | null;
    tools?: ToolDefinition[];
    toolDispatcher?: ToolDispatcher;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class AnswerGenerator {
    private model: LanguageModel;
    private maxRounds: number;
    private systemPrompt: string;
    private continuationPolicy: ContinuationPolicy;
    private log: Logger;

    constructor(model: LanguageModel, options: AnswerGeneratorOptions = {}) {
        this.model = model;
        this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
        this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
        this.continuationPolicy = options.continuationPolicy ?? phraseContinuationPolicy;
        this.log = (options.logger ?? makeLogger()).child({ component: 'answer-generator' });
    }

    async answer(query: string, options: AnswerOptions = {}): Promise<string> {
        const outcome = await this.generate(query, options);
        return outcome.answer;
    }

    async generate(query: string, options: AnswerOptions = {}): Promise<GenerationOutcome> {
        const state = new ConversationState({
            originalQuery: query,
            systemPrompt: buildInitialSystemPrompt(this.systemPrompt, options.conversationHistory),
            maxRounds: this.maxRounds,
        });

        const tools = options.tools ?? [];
        const counters = { toolCalls: 0 };
        const { answer, termination } = await this.runRounds(state, tools, options.toolDispatcher, counters);

        this.log.debug({ termination, rounds: state.roundCount, toolCalls: counters.toolCalls }, 'answer complete');
        return { answer, termination, roundsUsed: state.roundCount, toolCalls: counters.toolCalls };
    }

    private async runRounds(
        state: ConversationState,
        tools: ToolDefinition[],
        dispatcher: ToolDispatcher | undefined,
        counters: { toolCalls: number }
    ): Promise<{ answer: string; termination: Termination }> {
        while (state.canContinue()) {
            const round = state.beginRound();
            const system = buildRoundSystemPrompt(state);
            this.log.debug({ round, maxRounds: state.maxRounds, contextEntries: state.accumulatedContext.length }, 'round start');

            const request: ModelRequest = { system, messages: state.messages };
            if (tools.length > 0) {
                request.tools = tools;
                request.toolChoice = { type: 'auto' };
            }

            let response: ModelResponse;
            try {
                response = await this.model.createMessage(request);
            } catch (error) {
                return this.recoverFromModelFailure(state, error);
            }

            const toolCalls = response.content.filter(isToolUse);
            if (response.stopReason !== 'tool_use' || !dispatcher || toolCalls.length === 0) {
                state.finish();
                return { answer: responseText(response), termination: 'direct' };
            }

            const results = await this.executeToolCalls(toolCalls, state, dispatcher);
            counters.toolCalls += toolCalls.length;
            state.appendMessage({ role: 'assistant', content: response.content });
            state.appendMessage({ role: 'user', content: results });

            let followUp: string;
            try {
                followUp = responseText(await this.model.createMessage({ system, messages: state.messages }));
            } catch (error) {
                return this.recoverFromModelFailure(state, error);
            }

            if (!this.continuationPolicy(followUp)) {
                state.finish();
                return { answer: followUp, termination: 'complete' };
            }

            if (!state.canContinue()) break;

            this.log.debug({ round }, 'follow-up asks for another round');
            state.appendMessage({ role: 'assistant', content: followUp });
        }

        return this.synthesize(state);
    }

    /**
     * Each call is isolated: a thrown error becomes that call's result text.
     */
    private async executeToolCalls(
        toolCalls: ToolUseBlock[],
        state: ConversationState,
        dispatcher: ToolDispatcher
    ): Promise<ToolResultBlock[]> {
        const results: ToolResultBlock[] = [];

        for (const call of toolCalls) {
            let output: string;
            try {
                this.log.debug({ tool: call.name, toolUseId: call.id }, 'tool dispatch');
                output = await dispatcher.dispatch(call.name, call.input);
            } catch (error) {
                this.log.warn({ tool: call.name, err: error }, 'tool execution failed');
                output = `Tool execution failed: ${errorMessage(error)}`;
            }

            state.addToolContext(`${call.name}: ${output}`);
            results.push({ type: 'tool_result', toolUseId: call.id, content: output });
        }

        return results;
    }

    private async recoverFromModelFailure(
        state: ConversationState,
        error: unknown
    ): Promise<{ answer: string; termination: Termination }> {
        if (!state.hasContext()) throw error;

        this.log.warn({ err: error, round: state.roundCount }, 'model call failed; synthesizing from gathered context');
        return this.synthesize(state);
    }

    /**
     * Final answer from the accumulated tool results alone: a fixed apology when
     * there are none, the raw results when the synthesis call itself fails.
     */
    async synthesize(state: ConversationState): Promise<{ answer: string; termination: Termination }> {
        state.startSynthesis();

        if (!state.hasContext()) {
            state.finish();
            return { answer: NO_CONTEXT_APOLOGY, termination: 'apology' };
        }

        const contextSummary = state.accumulatedContext.join('\n\n');
        try {
            const response = await this.model.createMessage({
                system: SYNTHESIS_SYSTEM_PROMPT,
                messages: [{ role: 'user', content: buildSynthesisPrompt(state.originalQuery, contextSummary) }],
            });
            return { answer: responseText(response), termination: 'synthesized' };
        } catch (error) {
            this.log.warn({ err: error }, 'synthesis call failed; returning gathered context');
            return { answer: `${SYNTHESIS_FALLBACK_PREFIX}\n\n${contextSummary}`, termination: 'raw-context' };
        } finally {
            state.finish();
        }
    }
}
