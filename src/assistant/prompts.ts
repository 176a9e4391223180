/**
 * Assistant Prompts - system prompts and the per-round prompt builders
 */

import type { ConversationState } from './conversation-state.js';

/** Process-wide base instruction; never mutated at runtime. */
export const SYSTEM_PROMPT = `You are an assistant for course materials and educational content, with search and outline tools over the course catalog.

Tool Usage Guidelines:
- **Content Search**: use the search tool for questions about specific course content or detailed educational material
- **Course Outline**: use the outline tool for questions about course structure, lesson lists or a course overview
- **Sequential Tool Usage**: you may use tools across more than one round to gather information for complex questions
- **Multi-step Reasoning**: use earlier tool results to decide what to search for next
- Answer from tool results, accurately and factually
- If tools yield no results, say so plainly without offering alternatives

Sequential Tool Usage Examples:
- "Find a course that covers the same topic as lesson 4 of course X" -> get the outline of course X to find lesson 4's title, then search for that topic
- Comparing content across courses -> search each course, then combine the findings

Response Protocol:
- **General knowledge questions**: answer from your own knowledge without tools
- **Course content questions**: search as needed, then answer
- **Course outline questions**: use the outline tool, then answer with the course title, course link and the complete numbered lesson list
- **No meta-commentary**: give the answer only; do not describe your reasoning, the tools, or say "based on the search results"

Every answer must be:
1. **Brief, Concise and focused**
2. **Educational**
3. **Clear**
4. **Example-supported** when an example helps understanding`;

export const SYNTHESIS_SYSTEM_PROMPT = 'You are an AI assistant. Synthesize the provided information to answer the user\'s question comprehensively and accurately. Provide only the direct answer without mentioning the synthesis process.';

export const NO_CONTEXT_APOLOGY = "I apologize, but I wasn't able to gather the information needed to answer your question.";

export const SYNTHESIS_FALLBACK_PREFIX = "Based on my search, here's what I found:";

export function buildCourseQueryPrompt(query: string): string {
    return `Answer this question about course materials: ${query}`;
}

/**
 * Round 1's system prompt: the base prompt, plus prior session turns when there are any.
 */
export function buildInitialSystemPrompt(basePrompt: string, conversationHistory?: string | null): string {
    return conversationHistory
        ? `${basePrompt}\n\nPrevious conversation:\n${conversationHistory}`
        : basePrompt;
}

/**
 * Later rounds, and any final round, add the tool results gathered so far
 * and say which round this is.
 */
export function buildRoundSystemPrompt(state: ConversationState): string {
    const isFinal = state.isFinalRound();
    if (state.roundCount <= 1 && !isFinal) return state.systemPrompt;

    const sections = [state.systemPrompt];
    if (state.hasContext()) {
        sections.push(`Previous tool results from this query:\n${state.accumulatedContext.join('\n')}`);
    }
    sections.push(
        `This is round ${state.roundCount} of ${state.maxRounds}. ` +
        (isFinal
            ? 'This is your final round of tool usage.'
            : 'You may use tools again if needed for follow-up searches.')
    );

    return sections.join('\n\n');
}

export function buildSynthesisPrompt(originalQuery: string, contextSummary: string): string {
    return `Based on the information I gathered:

${contextSummary}

Please provide a comprehensive answer to: ${originalQuery}`;
}
