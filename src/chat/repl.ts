/**
 * Interactive chat over one conversation session
 */

import inquirer from 'inquirer';
import type { CourseAssistant, QueryResult } from '../assistant/course-assistant.js';
import { saveAnswer } from '../export/formats.js';
import { colors, divider } from '../ui/theme.js';
import { createSpinner, showAnswer, showError, showHeader, showInfo, showSources } from '../ui/components.js';

export type CommandAction = 'continue' | 'exit';

export interface ChatReplOptions {
    model?: string;
    renderMarkdown?: boolean;
}

export class ChatRepl {
    private assistant: CourseAssistant;
    private options: ChatReplOptions;
    private sessionId: string;
    private last: { query: string; result: QueryResult } | null = null;

    constructor(assistant: CourseAssistant, options: ChatReplOptions = {}) {
        this.assistant = assistant;
        this.options = options;
        this.sessionId = assistant.sessions.createSession();
    }

    get currentSessionId(): string {
        return this.sessionId;
    }

    async start(): Promise<void> {
        this.showWelcome();

        while (true) {
            const { input } = await inquirer.prompt<{ input: string }>([
                {
                    type: 'input',
                    name: 'input',
                    message: colors.primary('>'),
                },
            ]);

            const line = String(input ?? '').trim();
            if (!line) continue;

            if (line.startsWith('/')) {
                try {
                    const action = await this.handleCommand(line);
                    if (action === 'exit') return;
                } catch (error) {
                    showError(error instanceof Error ? error.message : String(error));
                }
                continue;
            }

            try {
                await this.ask(line);
            } catch (error) {
                showError(error instanceof Error ? error.message : String(error));
            }
        }
    }

    async ask(query: string): Promise<QueryResult> {
        const spinner = createSpinner('Searching course materials...');
        spinner.start();

        let result: QueryResult;
        try {
            result = await this.assistant.query(query, this.sessionId);
        } finally {
            spinner.stop();
        }

        this.last = { query, result };
        showAnswer(result.answer, { renderMarkdown: this.options.renderMarkdown });
        showSources(result.sources);
        console.log();
        return result;
    }

    async handleCommand(line: string): Promise<CommandAction> {
        const [command = '', ...rest] = line.split(/\s+/);
        const arg = rest.join(' ').trim();

        switch (command.toLowerCase()) {
            case '/exit':
            case '/quit':
                return 'exit';
            case '/new':
                this.sessionId = this.assistant.sessions.createSession();
                this.last = null;
                showInfo(`Started ${this.sessionId}`);
                return 'continue';
            case '/clear':
                this.assistant.sessions.clearSession(this.sessionId);
                showInfo('Conversation history cleared');
                return 'continue';
            case '/sources':
                if (!this.last || this.last.result.sources.length === 0) {
                    showInfo('No sources for the last answer');
                } else {
                    showSources(this.last.result.sources);
                }
                return 'continue';
            case '/save': {
                if (!this.last) throw new Error('Nothing to save yet');
                if (!arg) throw new Error('Usage: /save <file.md|file.json|file.html|file.txt>');
                const format = await saveAnswer(arg, this.last.result, this.last.query);
                showInfo(`Saved ${format} to ${arg}`);
                return 'continue';
            }
            case '/help':
                this.showHelp();
                return 'continue';
            default:
                throw new Error(`Unknown command: ${command}. Type /help for commands.`);
        }
    }

    private showWelcome(): void {
        showHeader({ model: this.options.model, subtitle: 'Ask about the course catalog.' });
        console.log();
        console.log(colors.muted('Type /help for commands, or /exit to quit.'));
        console.log();
    }

    private showHelp(): void {
        console.log();
        console.log(colors.primary('Commands'));
        console.log(colors.muted(divider(40)));
        console.log('  ' + colors.secondary('/new') + '               Start a fresh conversation');
        console.log('  ' + colors.secondary('/clear') + '             Forget this conversation\'s history');
        console.log('  ' + colors.secondary('/sources') + '           Show sources from the last answer');
        console.log('  ' + colors.secondary('/save <file>') + '       Export the last answer');
        console.log('  ' + colors.secondary('/exit') + '              Quit');
        console.log();
    }
}
