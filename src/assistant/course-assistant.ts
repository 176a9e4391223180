/**
 * Course Assistant - wires the course store, retrieval tools, answer loop and sessions
 */

import type { Config } from '../config.js';
import { OpenRouterClient } from '../clients/openrouter.js';
import { LocalCourseStore } from '../catalog/local-course-store.js';
import type { CourseStore } from '../catalog/types.js';
import { CourseOutlineTool } from '../tools/course-outline.js';
import { CourseSearchTool } from '../tools/course-search.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import type { SourceAttribution } from '../tools/types.js';
import { makeLogger, type Logger } from '../utils/logger.js';
import { AnswerGenerator } from './generator.js';
import { OpenRouterLanguageModel } from './openrouter-model.js';
import { buildCourseQueryPrompt } from './prompts.js';
import { SessionManager } from './session-manager.js';
import type { LanguageModel } from './types.js';

export interface QueryResult {
    answer: string;
    sources: SourceAttribution[];
}

export interface CourseAnalytics {
    totalCourses: number;
    courseTitles: string[];
}

export interface CourseAssistantOptions {
    store: CourseStore;
    model: LanguageModel;
    maxRounds?: number;
    maxHistory?: number;
    logger?: Logger;
}

export class CourseAssistant {
    readonly store: CourseStore;
    readonly registry: ToolRegistry;
    readonly sessions: SessionManager;
    private generator: AnswerGenerator;
    private log: Logger;

    constructor(options: CourseAssistantOptions) {
        this.store = options.store;
        this.log = (options.logger ?? makeLogger()).child({ component: 'course-assistant' });

        this.registry = new ToolRegistry();
        this.registry.register(new CourseSearchTool(this.store));
        this.registry.register(new CourseOutlineTool(this.store));

        this.generator = new AnswerGenerator(options.model, {
            maxRounds: options.maxRounds,
            logger: options.logger,
        });
        this.sessions = new SessionManager(options.maxHistory);
    }

    /**
     * Answer one question. Sources are harvested from the registry and then
     * cleared, so nothing leaks into the next query.
     */
    async query(query: string, sessionId?: string): Promise<QueryResult> {
        const answer = await this.generator.answer(buildCourseQueryPrompt(query), {
            conversationHistory: this.sessions.getConversationHistory(sessionId),
            tools: this.registry.definitions(),
            toolDispatcher: this.registry,
        });

        const labels = this.registry.lastSources();
        const links = this.registry.lastSourceLinks();
        const sources = labels.map((label, index) => ({ label, link: links[index] ?? null }));
        this.registry.reset();

        if (sessionId) {
            this.sessions.addExchange(sessionId, query, answer);
        }

        this.log.debug({ sessionId, sources: sources.length }, 'query answered');
        return { answer, sources };
    }

    async getCourseAnalytics(): Promise<CourseAnalytics> {
        return getCourseAnalytics(this.store);
    }
}

export async function getCourseAnalytics(store: CourseStore): Promise<CourseAnalytics> {
    const [totalCourses, courseTitles] = await Promise.all([
        store.getCourseCount(),
        store.getCourseTitles(),
    ]);
    return { totalCourses, courseTitles };
}

/**
 * Build an assistant backed by OpenRouter and the JSON course catalog.
 */
export async function createCourseAssistant(
    config: Config,
    overrides: { model?: string; maxRounds?: number; catalogPath?: string } = {}
): Promise<CourseAssistant> {
    const logger = makeLogger({}, config.logLevel);
    const store = await LocalCourseStore.fromFile(overrides.catalogPath ?? config.catalogPath, {
        maxResults: config.maxResults,
    });
    const client = new OpenRouterClient(config.openrouterApiKey, { timeoutMs: config.llmTimeoutMs });
    const model = new OpenRouterLanguageModel(client, {
        model: overrides.model ?? config.defaultModel,
        temperature: config.modelTemperature,
        maxTokens: config.modelMaxTokens,
    });

    return new CourseAssistant({
        store,
        model,
        maxRounds: overrides.maxRounds ?? config.maxToolRounds,
        maxHistory: config.maxHistory,
        logger,
    });
}
