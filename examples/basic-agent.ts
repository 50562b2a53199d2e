/**
 * Basic agent loop example
 *
 * Streams a coding agent's answer to stdout, with the local file and shell tools.
 * Uses the scripted mock provider unless OPENAI_API_KEY is set.
 *
 * Run with: npm run example -- "List the TypeScript files in this directory"
 */
import 'dotenv/config';
import { AgentLoop, createLLMProvider, createLogger, type LLMConfig } from '@stepwise/core';
import { createFileSystemTools } from '@stepwise/tools-filesystem';
import { createProcessTools } from '@stepwise/tools-process';

const logger = createLogger({ agentId: 'basic-agent', config: { level: 'warn' } });

const llm: LLMConfig = process.env.OPENAI_API_KEY
    ? { provider: 'openai-chat', model: process.env.OPENAI_MODEL ?? 'gpt-4o-mini' }
    : { provider: 'mock', model: 'scripted', scenario: 'thinking_text_tool' };

const agent = new AgentLoop({
    provider: createLLMProvider(llm, logger),
    tools: [
        ...createFileSystemTools({ config: { workingDirectory: process.cwd() }, logger }),
        ...createProcessTools({ config: { workingDirectory: process.cwd() }, logger }),
    ],
    systemPrompt: 'You are a coding assistant working in the current directory.',
    logger,
});

agent.eventBus.on('llm:text-delta', (event) => process.stdout.write(event.delta));
agent.eventBus.on('llm:tool-start', (event) => console.log(`\n[tool] ${event.toolName}`));
agent.eventBus.on('llm:warning', (event) => console.warn(`\n[warning] ${event.message}`));

process.once('SIGINT', () => agent.cancel());

const prompt = process.argv[2] ?? 'What files are in this directory?';
const result = await agent.submit(prompt);

console.log(`\n\nStopped: ${result.stopReason} after ${result.turns} turn(s)`);
if (result.error) {
    console.error(result.error.message);
    process.exitCode = 1;
}
agent.dispose();
