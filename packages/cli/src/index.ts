#!/usr/bin/env node
/**
 * stepwise: interactive terminal front end for the task engine.
 *
 *   stepwise [--config path] [task]
 *
 * The engine runs in-process; approvals and breakpoints reach the UI through
 * an EngineBridge, which holds each request until the user answers it.
 */
import React from 'react';
import { render } from 'ink';
import { loadConfig, createEngine } from '@stepwise/core';
import { parseCliArgs, USAGE } from './args.js';
import { EngineBridge } from './engine.bridge.js';
import { App } from './components/App.js';

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  const config = await loadConfig(args.configPath);
  const bridge = new EngineBridge();
  const abort = new AbortController();
  const engine = createEngine(config, { approval: bridge, signal: abort.signal });

  const { waitUntilExit } = render(
    React.createElement(App, { config, engine, bridge, initialTask: args.task }),
    { exitOnCtrlC: false },
  );

  try {
    await waitUntilExit();
  } finally {
    abort.abort();
    bridge.cancelAll();
    await engine.close();
  }
}

main().catch((err: unknown) => {
  process.stderr.write((err instanceof Error ? err.message : String(err)) + '\n');
  process.exit(1);
});
