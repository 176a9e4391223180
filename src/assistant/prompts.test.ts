import { describe, it, expect } from 'vitest';
import { ConversationState } from './conversation-state.js';
import {
    buildCourseQueryPrompt,
    buildInitialSystemPrompt,
    buildRoundSystemPrompt,
    buildSynthesisPrompt,
} from './prompts.js';

describe('prompt builders', () => {
    it('should wrap a user question for the course assistant', () => {
        expect(buildCourseQueryPrompt('What is lesson 2 about?'))
            .toBe('Answer this question about course materials: What is lesson 2 about?');
    });

    it('should append history only when there is some', () => {
        expect(buildInitialSystemPrompt('base')).toBe('base');
        expect(buildInitialSystemPrompt('base', null)).toBe('base');
        expect(buildInitialSystemPrompt('base', 'User: hi')).toBe('base\n\nPrevious conversation:\nUser: hi');
    });

    it('should leave a non-final first round unchanged', () => {
        const state = new ConversationState({ originalQuery: 'q', systemPrompt: 'base', maxRounds: 3 });
        state.beginRound();

        expect(buildRoundSystemPrompt(state)).toBe('base');
    });

    it('should describe a middle round with its gathered results', () => {
        const state = new ConversationState({ originalQuery: 'q', systemPrompt: 'base', maxRounds: 3 });
        state.beginRound();
        state.addToolContext('search_course_content: one');
        state.addToolContext('get_course_outline: two');
        state.beginRound();

        expect(buildRoundSystemPrompt(state)).toBe(
            'base\n\n' +
            'Previous tool results from this query:\nsearch_course_content: one\nget_course_outline: two\n\n' +
            'This is round 2 of 3. You may use tools again if needed for follow-up searches.'
        );
    });

    it('should build the synthesis request around the context', () => {
        expect(buildSynthesisPrompt('Why chunk?', 'search_course_content: passages')).toBe(
            'Based on the information I gathered:\n\nsearch_course_content: passages\n\nPlease provide a comprehensive answer to: Why chunk?'
        );
    });
});
