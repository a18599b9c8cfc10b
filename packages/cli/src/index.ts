#!/usr/bin/env tsx
import { run } from './program';

async function main() {
  const controller = new AbortController();
  // A second Ctrl-C falls through to the default handler.
  process.once('SIGINT', () => controller.abort());

  process.exitCode = await run(process.argv, { signal: controller.signal });
}

void main();
