/**
 * In-memory conversation sessions, trimmed to the most recent exchanges.
 */

export interface SessionMessage {
    role: 'user' | 'assistant';
    content: string;
}

export class SessionManager {
    private sessions = new Map<string, SessionMessage[]>();
    private counter = 0;
    private maxHistory: number;

    /**
     * @param maxHistory exchanges (user + assistant pairs) kept per session
     */
    constructor(maxHistory = 2) {
        this.maxHistory = maxHistory;
    }

    createSession(): string {
        this.counter += 1;
        const sessionId = `session_${this.counter}`;
        this.sessions.set(sessionId, []);
        return sessionId;
    }

    addMessage(sessionId: string, role: SessionMessage['role'], content: string): void {
        const messages = this.sessions.get(sessionId) ?? [];
        messages.push({ role, content });

        const limit = this.maxHistory * 2;
        this.sessions.set(sessionId, messages.length > limit ? messages.slice(-limit) : messages);
    }

    addExchange(sessionId: string, userMessage: string, assistantMessage: string): void {
        this.addMessage(sessionId, 'user', userMessage);
        this.addMessage(sessionId, 'assistant', assistantMessage);
    }

    /** `User: …` / `Assistant: …` lines, or null for an unknown or empty session. */
    getConversationHistory(sessionId: string | undefined): string | null {
        if (!sessionId) return null;
        const messages = this.sessions.get(sessionId);
        if (!messages || messages.length === 0) return null;

        return messages
            .map((message) => `${message.role === 'user' ? 'User' : 'Assistant'}: ${message.content}`)
            .join('\n');
    }

    clearSession(sessionId: string): void {
        if (this.sessions.has(sessionId)) {
            this.sessions.set(sessionId, []);
        }
    }
}
