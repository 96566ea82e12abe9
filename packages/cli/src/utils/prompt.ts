/**
 * Interactive key prompt for records automatic resolution could not match.
 */

import * as readline from 'readline';
import chalk from 'chalk';
import type { ResolutionOutcome, TestRecord } from '@testbridge/core';
import type { KeyPrompt, PromptAnswer } from './pipeline.js';

/**
 * Interpret one line of user input.
 * Empty input skips the record, "n" or "new" creates a new issue,
 * anything else is taken as a key.
 */
export function parsePromptAnswer(input: string): PromptAnswer {
  const trimmed = input.trim();
  if (trimmed === '') return { action: 'skip' };
  const lower = trimmed.toLowerCase();
  if (lower === 'n' || lower === 'new') return { action: 'create' };
  return { action: 'key', key: trimmed };
}

function describe(record: TestRecord, outcome: ResolutionOutcome): string {
  const lines = [
    '',
    chalk.bold(`Record ${record.id}${record.sourceKey ? ` (${record.sourceKey})` : ''}`),
    `  Summary: ${record.summary}`,
  ];
  if (record.description) {
    lines.push(`  Description: ${record.description.split('\n')[0]}`);
  }
  if (outcome.state === 'Unresolved' || outcome.state === 'PendingManual') {
    lines.push(chalk.yellow(`  ${outcome.reason}`));
  }
  if (outcome.state === 'Unresolved' && outcome.candidates.length > 0) {
    lines.push(`  Candidates: ${outcome.candidates.join(', ')}`);
  }
  return lines.join('\n');
}

export interface ReadlinePromptOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Build a KeyPrompt that reads answers from stdin. Once the input ends,
 * pending and later questions are answered with a skip.
 */
export function createReadlinePrompt(options: ReadlinePromptOptions = {}): {
  prompt: KeyPrompt;
  close: () => void;
} {
  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
  });

  let closed = false;
  const pending = new Set<(answer: PromptAnswer) => void>();
  rl.on('close', () => {
    closed = true;
    for (const settle of pending) settle({ action: 'skip' });
    pending.clear();
  });

  const prompt: KeyPrompt = (record, outcome, error) => {
    if (closed) return Promise.resolve<PromptAnswer>({ action: 'skip' });
    console.log(describe(record, outcome));
    if (error) {
      console.log(chalk.red(`  ${error}`));
    }
    return new Promise((resolve) => {
      pending.add(resolve);
      rl.question('  Target key ("n" = create new, empty = skip): ', (answer) => {
        pending.delete(resolve);
        resolve(parsePromptAnswer(answer));
      });
    });
  };

  return { prompt, close: () => rl.close() };
}
