import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { ChatRepl } from './repl.js';
import { CourseAssistant } from '../assistant/course-assistant.js';
import { LocalCourseStore } from '../catalog/local-course-store.js';
import { makeNoopLogger } from '../utils/logger.js';
import { TEST_CATALOG } from '../__tests__/fixtures.js';
import type { ModelRequest, ModelResponse } from '../assistant/types.js';

function text(value: string): ModelResponse {
    return { stopReason: 'end_turn', content: [{ type: 'text', text: value }] };
}

describe('ChatRepl', () => {
    let logSpy: MockInstance<typeof console.log>;
    let createMessage: ReturnType<typeof createModel>;
    let assistant: CourseAssistant;

    function createModel() {
        return vi.fn<(request: ModelRequest) => Promise<ModelResponse>>();
    }

    beforeEach(() => {
        logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        process.env.UI_MODE = 'plain';
        createMessage = createModel();
        assistant = new CourseAssistant({
            store: new LocalCourseStore(TEST_CATALOG),
            model: { createMessage },
            logger: makeNoopLogger(),
        });
    });

    afterEach(() => {
        logSpy.mockRestore();
        delete process.env.UI_MODE;
    });

    it('should open a session on creation and a new one on /new', async () => {
        const repl = new ChatRepl(assistant);
        expect(repl.currentSessionId).toBe('session_1');

        expect(await repl.handleCommand('/new')).toBe('continue');
        expect(repl.currentSessionId).toBe('session_2');
    });

    it('should exit on /exit and /quit', async () => {
        const repl = new ChatRepl(assistant);

        expect(await repl.handleCommand('/exit')).toBe('exit');
        expect(await repl.handleCommand('/QUIT')).toBe('exit');
    });

    it('should ask within the session and forget it on /clear', async () => {
        createMessage.mockResolvedValueOnce(text('Two lessons.'));
        const repl = new ChatRepl(assistant);

        const result = await repl.ask('How many lessons in agents?');

        expect(result.answer).toBe('Two lessons.');
        expect(assistant.sessions.getConversationHistory(repl.currentSessionId))
            .toBe('User: How many lessons in agents?\nAssistant: Two lessons.');

        await repl.handleCommand('/clear');
        expect(assistant.sessions.getConversationHistory(repl.currentSessionId)).toBeNull();
    });

    it('should save the last answer', async () => {
        const dir = await mkdtemp(path.join(tmpdir(), 'course-assistant-repl-'));
        try {
            createMessage.mockResolvedValueOnce(text('Retrieval grounds answers.'));
            const repl = new ChatRepl(assistant);
            await repl.ask('What is retrieval?');

            const file = path.join(dir, 'last.json');
            await repl.handleCommand(`/save ${file}`);

            expect(JSON.parse(await readFile(file, 'utf-8'))).toEqual({
                query: 'What is retrieval?',
                answer: 'Retrieval grounds answers.',
                sources: [],
            });
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });

    it('should reject /save before any answer and unknown commands', async () => {
        const repl = new ChatRepl(assistant);

        await expect(repl.handleCommand('/save out.md')).rejects.toThrow('Nothing to save yet');
        await expect(repl.handleCommand('/bogus')).rejects.toThrow('Unknown command: /bogus. Type /help for commands.');
    });
});
