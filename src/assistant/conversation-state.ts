/**
 * Conversation State - one query's transcript, round counter and tool-result ledger
 */

import type { ConversationMessage } from './types.js';

export const DEFAULT_MAX_ROUNDS = 2;

export type LoopPhase = 'ROUND_ACTIVE' | 'SYNTHESIZING' | 'DONE';

export interface ConversationStateInit {
    originalQuery: string;
    systemPrompt: string;
    maxRounds?: number;
    messages?: ConversationMessage[];
}

export class ConversationState {
    readonly originalQuery: string;
    readonly systemPrompt: string;
    readonly maxRounds: number;

    private transcript: ConversationMessage[];
    private rounds = 0;
    private context: string[] = [];
    private currentPhase: LoopPhase = 'ROUND_ACTIVE';

    constructor(init: ConversationStateInit) {
        const maxRounds = init.maxRounds ?? DEFAULT_MAX_ROUNDS;
        if (!Number.isInteger(maxRounds) || maxRounds < 1) {
            throw new RangeError(`maxRounds must be a positive integer, got ${maxRounds}`);
        }

        this.originalQuery = init.originalQuery;
        this.systemPrompt = init.systemPrompt;
        this.maxRounds = maxRounds;
        this.transcript = init.messages
            ? [...init.messages]
            : [{ role: 'user', content: init.originalQuery }];
    }

    get roundCount(): number {
        return this.rounds;
    }

    get phase(): LoopPhase {
        return this.currentPhase;
    }

    /** Snapshot of the transcript; callers never mutate the live list. */
    get messages(): ConversationMessage[] {
        return [...this.transcript];
    }

    get accumulatedContext(): readonly string[] {
        return this.context;
    }

    canContinue(): boolean {
        return this.currentPhase === 'ROUND_ACTIVE' && this.rounds < this.maxRounds;
    }

    beginRound(): number {
        if (!this.canContinue()) {
            throw new Error(`No rounds left (round ${this.rounds} of ${this.maxRounds}, phase ${this.currentPhase})`);
        }
        this.rounds += 1;
        return this.rounds;
    }

    isFinalRound(): boolean {
        return this.rounds === this.maxRounds;
    }

    appendMessage(message: ConversationMessage): void {
        this.transcript.push(message);
    }

    /**
     * Insertion-ordered, duplicates and empty strings ignored.
     * Returns whether the entry was new.
     */
    addToolContext(entry: string): boolean {
        if (!entry || this.context.includes(entry)) return false;
        this.context.push(entry);
        return true;
    }

    hasContext(): boolean {
        return this.context.length > 0;
    }

    startSynthesis(): void {
        if (this.currentPhase === 'DONE') {
            throw new Error('Conversation already finished');
        }
        this.currentPhase = 'SYNTHESIZING';
    }

    finish(): void {
        this.currentPhase = 'DONE';
    }
}
