#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config.js';
import {
  clear,
  closeRuntime,
  configure,
  createRuntime,
  history,
  list,
  processInputs,
  query,
  status,
  type Runtime
} from './commands.js';
import { parseSettingValue, resetSettings } from './db/settings.js';
import { errorMessage } from './errors.js';
import { buildIngestionSummary, describeSource } from './ingest/summary.js';

const USAGE = [
  'Usage:',
  '  kb process <file-or-youtube-url> [...more]',
  '  kb query "<question>"',
  '  kb list',
  '  kb clear --confirm',
  '  kb status',
  '  kb history [--limit <n>]',
  '  kb config set <topK|excerptLength|relevanceFloor|retrievalMode|visionEnabled> <value>',
  '  kb config reset'
].join('\n');

function parseFlags(args: string[]): { positional: string[]; flags: Record<string, string> } {
  const positional: string[] = [];
  const flags: Record<string, string> = {};
  let i = 0;
  while (i < args.length) {
    if (args[i].startsWith('--')) {
      const hasValue = i + 1 < args.length && !args[i + 1].startsWith('--');
      flags[args[i].slice(2)] = hasValue ? args[i + 1] : 'true';
      i += hasValue ? 2 : 1;
    } else {
      positional.push(args[i]);
      i++;
    }
  }
  return { positional, flags };
}

async function runCommand(runtime: Runtime, cmd: string | undefined, rest: string[]): Promise<number> {
  if (cmd === 'process') {
    const { positional } = parseFlags(rest);
    if (!positional.length) {
      console.error('Error: at least one file path or YouTube URL is required.\n' + USAGE);
      return 1;
    }

    const controller = new AbortController();
    const onSigint = () => {
      console.error('\nStopping after the current input…');
      controller.abort();
    };
    process.once('SIGINT', onSigint);
    try {
      const summary = await processInputs(runtime, positional, {
        signal: controller.signal,
        onResult: (result) => console.log(buildIngestionSummary(result))
      });
      const failed = summary.results.filter((r) => r.status === 'failed' || r.status === 'unsupported').length;
      console.log(`\nJob #${summary.jobId} ${summary.status}: ${summary.results.length - failed} of ${summary.results.length} inputs ok`);
      return failed > 0 ? 1 : 0;
    } finally {
      process.off('SIGINT', onSigint);
    }
  }

  if (cmd === 'query' || cmd === 'ask') {
    const question = parseFlags(rest).positional.join(' ').trim();
    if (!question) {
      console.error('Error: a question is required.\n' + USAGE);
      return 1;
    }
    const result = await query(runtime, question);
    console.log(result.answer);
    if (result.sourceIds.length) console.log(`\nSources: ${result.sourceIds.join(', ')}`);
    return 0;
  }

  if (cmd === 'list') {
    let count = 0;
    for (const record of list(runtime)) {
      console.log(describeSource(record));
      count++;
    }
    if (count === 0) console.log('No sources yet. Add some with: kb process <file-or-url>');
    return 0;
  }

  if (cmd === 'clear') {
    const result = clear(runtime, parseFlags(rest).flags.confirm === 'true');
    if (!result.cleared) {
      console.error(result.message);
      return 1;
    }
    console.log(`Cleared ${result.sourcesDeleted} source(s).`);
    return 0;
  }

  if (cmd === 'status') {
    console.log(JSON.stringify(status(runtime), null, 2));
    return 0;
  }

  if (cmd === 'history') {
    const limit = Number(parseFlags(rest).flags.limit ?? 20);
    for (const entry of history(runtime, Number.isInteger(limit) && limit > 0 ? limit : 20)) {
      console.log(`#${entry.id} [${entry.status}] ${entry.created_at}  ${entry.question}`);
      if (entry.answer) console.log(`    ${entry.answer.replace(/\s+/g, ' ').slice(0, 160)}`);
    }
    return 0;
  }

  if (cmd === 'config' && rest[0] === 'set' && rest[1] && rest[2] !== undefined) {
    const next = configure(runtime, parseSettingValue(rest[1], rest.slice(2).join(' ')));
    console.log(JSON.stringify(next, null, 2));
    return 0;
  }

  if (cmd === 'config' && rest[0] === 'reset') {
    console.log(JSON.stringify(resetSettings(runtime.ctx, runtime.defaults), null, 2));
    return 0;
  }

  console.log(USAGE);
  return cmd ? 1 : 0;
}

async function main(): Promise<number> {
  const rawArgs = process.argv.slice(2);
  const runtime = await createRuntime(loadConfig());
  try {
    return await runCommand(runtime, rawArgs[0], rawArgs.slice(1));
  } finally {
    closeRuntime(runtime);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
