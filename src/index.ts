#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig } from './config';
import { createConsolePrompter } from './cli/prompts';
import { PropertyAnalysisSession } from './session';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const session = new PropertyAnalysisSession(config, {
    prompter: createConsolePrompter(),
  });
  const { exitCode, interrupted } = await session.run();
  if (interrupted) {
    // Abandoned requests would otherwise hold the process until they time out.
    process.exit(exitCode);
  }
  process.exitCode = exitCode;
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
