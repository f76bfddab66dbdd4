#!/usr/bin/env tsx
/**
 * Desktop setup script
 *
 * Stores the Tempo AI API key in a local .env file readable only by the
 * current user, then prints the entry to add to Claude Desktop's
 * claude_desktop_config.json.
 * Run with: npm run install:desktop [-- --api-key <key>]
 *
 * To get an API key:
 * 1. Log in at https://jointempo.ai/signin
 * 2. Go to Settings > Developer
 * 3. Generate a new API key
 */

import * as readline from 'readline';
import { chmodSync, existsSync, writeFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';

export const DESKTOP_SERVER_NAME = 'TempoAI';

export interface DesktopConfig {
  mcpServers: Record<string, { command: string; args: string[]; env: Record<string, string> }>;
}

/**
 * Read the key from `--api-key <key>` / `--api-key=<key>`, falling back to
 * TEMPO_API_KEY.
 */
export function getApiKeyArgument(argv: string[], env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--api-key') {
      return argv[i + 1];
    }
    if (arg.startsWith('--api-key=')) {
      return arg.slice('--api-key='.length);
    }
  }
  return env.TEMPO_API_KEY;
}

/**
 * Write API_KEY to `<dir>/.env` with owner-only permissions.
 * @returns Path of the written file
 */
export function writeEnvFile(apiKey: string, dir: string): string {
  const key = apiKey.trim();
  if (!key) {
    throw new Error('API key is required.');
  }
  if (/[\r\n]/.test(key)) {
    throw new Error('API key must be a single line.');
  }

  const envFile = join(dir, '.env');
  writeFileSync(envFile, `API_KEY=${key}\n`, { mode: 0o600 });
  // mode only applies when the file is created
  chmodSync(envFile, 0o600);
  return envFile;
}

/**
 * Claude Desktop entry that launches the stdio server. The key stays in the
 * .env file; dotenv finds it through DOTENV_CONFIG_PATH.
 */
export function buildDesktopConfig(entryPath: string, envFile: string): DesktopConfig {
  return {
    mcpServers: {
      [DESKTOP_SERVER_NAME]: {
        command: 'node',
        args: [entryPath],
        env: { DOTENV_CONFIG_PATH: envFile },
      },
    },
  };
}

async function promptForApiKey(): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise<string>((resolvePrompt) => {
    rl.question('Enter your Tempo AI API key: ', (answer) => {
      rl.close();
      resolvePrompt(answer.trim());
    });
  });
}

async function main() {
  console.log('\n🔑 Tempo AI MCP Server Setup\n');

  const packageDir = resolve(dirname(fileURLToPath(import.meta.url)), '../..');
  const entryPath = join(packageDir, 'dist', 'src', 'stdio.js');

  let apiKey = getApiKeyArgument(process.argv.slice(2));
  if (!apiKey) {
    console.log('To get your API key:');
    console.log('  1. Log in at https://jointempo.ai/signin');
    console.log('  2. Go to Settings > Developer');
    console.log('  3. Generate a new API key\n');
    apiKey = await promptForApiKey();
  }

  let envFile: string;
  try {
    envFile = writeEnvFile(apiKey, packageDir);
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
  console.log(`✅ API key saved to ${envFile} (owner read/write only)\n`);

  if (!existsSync(entryPath)) {
    console.log('⚠️  Server not built yet. Run `npm run build` before starting Claude Desktop.\n');
  }

  console.log('Add this to the "mcpServers" section of claude_desktop_config.json:\n');
  console.log(JSON.stringify(buildDesktopConfig(entryPath, envFile), null, 2));
  console.log('\nThen restart Claude Desktop and ask about your workouts.\n');
}

// Only run main() when executed directly, not when imported
const isMainModule = process.argv[1]?.endsWith('install.js') ||
                     process.argv[1]?.endsWith('install.ts');

if (isMainModule) {
  main().catch((error) => {
    console.error('Unexpected error:', error);
    process.exit(1);
  });
}
