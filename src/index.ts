#!/usr/bin/env node
import { Command } from 'commander';
import { createInterface } from 'node:readline/promises';
import { createAssistant } from './assistant.js';
import { cleanMarkdown } from './cli/format.js';
import { type Config, loadConfig } from './config.js';
import { errorMessage } from './errors.js';

interface CliOptions {
  query?: string;
  model?: string;
  ollamaUrl?: string;
  greeting: boolean;
}

function display(text: string): void {
  console.log(cleanMarkdown(text));
}

async function readQuery(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question('\nYour input: ');
  } finally {
    rl.close();
  }
}

function withOverrides(config: Config, opts: CliOptions): Config {
  return {
    ...config,
    ollama: {
      ...config.ollama,
      model: opts.model ?? config.ollama.model,
      apiUrl: opts.ollamaUrl ?? config.ollama.apiUrl,
    },
  };
}

async function run(opts: CliOptions): Promise<void> {
  console.log('=== Weather Summarizer ===\n');

  let config: Config;
  try {
    config = withOverrides(loadConfig(), opts);
  } catch (err) {
    display(`**Error**: ${errorMessage(err)}`);
    return;
  }

  const assistant = createAssistant(config);

  if (opts.greeting) {
    display(await assistant.greet());
  }

  const userInput = opts.query ?? await readQuery();
  const result = await assistant.runTurn(userInput);

  if (result.notice) {
    display(result.notice);
  }

  if (result.ok) {
    console.log('\n=== Weather Summary ===');
    display(result.summary);
  } else {
    display(result.error);
  }
}

const program = new Command();

program
  .name('weather-summarizer')
  .description('Ask about the weather in plain language and get an LLM-written summary')
  .version('1.0.0')
  .option('-q, --query <text>', 'answer this question instead of prompting for one')
  .option('--model <name>', 'chat model to use')
  .option('--ollama-url <url>', 'chat completion endpoint')
  .option('--no-greeting', 'skip the greeting')
  .action(async (opts: CliOptions) => {
    try {
      await run(opts);
    } catch (err) {
      display(`**Error**: ${errorMessage(err)}`);
    }
    process.exitCode = 0;
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`[CLI] ${errorMessage(err)}`);
  process.exitCode = 0;
});
