import { createInterface } from 'node:readline/promises';
import { ApiClient } from './client.js';
import { loadConfig } from './config.js';
import { CredentialStore } from './credentials.js';

export interface CliContext {
  client: ApiClient;
  credentials: CredentialStore;
  out: (text: string) => void;
  err: (text: string) => void;
  prompt: (question: string) => Promise<string>;
}

async function promptLine(question: string) {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

export function createContext(env: NodeJS.ProcessEnv = process.env): CliContext {
  const config = loadConfig(env);
  const credentials = new CredentialStore(config.homeDir);
  return {
    client: new ApiClient(config.apiUrl, credentials),
    credentials,
    out: (text) => process.stdout.write(`${text}\n`),
    err: (text) => process.stderr.write(`${text}\n`),
    prompt: promptLine,
  };
}
