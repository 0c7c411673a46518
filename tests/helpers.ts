import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Capabilities } from '../src/capabilities.js';
import { loadConfig, type KBConfig, type KBSettings } from '../src/config.js';
import type { CommandOutput, CommandRunner } from '../src/utils/command.js';

export function testConfig(
  overrides: { settings?: Partial<KBSettings>; capabilities?: Partial<Capabilities>; whisperModelPath?: string } = {}
): KBConfig {
  const base = loadConfig({ KB_DB_PATH: ':memory:' });
  return {
    ...base,
    settings: { ...base.settings, ...overrides.settings },
    capabilities: { ...base.capabilities, ...overrides.capabilities },
    tools: { ...base.tools, whisperModelPath: overrides.whisperModelPath ?? base.tools.whisperModelPath }
  };
}

export interface TempDir {
  path: string;
  file(name: string, content: string | Buffer): string;
  cleanup(): void;
}

export function makeTempDir(): TempDir {
  const path = mkdtempSync(join(tmpdir(), 'kb-test-'));
  return {
    path,
    file(name, content) {
      const target = join(path, name);
      writeFileSync(target, content);
      return target;
    },
    cleanup() {
      rmSync(path, { recursive: true, force: true });
    }
  };
}

export interface RecordedCall {
  command: string;
  args: string[];
}

/** Command runner that records calls and answers from a handler instead of spawning processes. */
export function fakeRunner(
  handler: (command: string, args: string[]) => CommandOutput | Promise<CommandOutput>
): { run: CommandRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const run: CommandRunner = async (command, args) => {
    calls.push({ command, args });
    return handler(command, args);
  };
  return { run, calls };
}
