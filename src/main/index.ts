#!/usr/bin/env node
import os from 'node:os';
import path from 'node:path';
import readline from 'node:readline';
import { TickworkError } from '../shared/errors';
import { isSoundEnabled, loadTimerConfig } from '../store/preferences';
import { RecordStore } from '../store/RecordStore';
import { FileStorage } from '../store/storage';
import { Store } from '../store/Store';
import { parseId, runCommand, splitArgs } from './commands';
import { TickworkApp } from './TickworkApp';

export function dataFilePath(): string {
  const home = process.env.TICKWORK_HOME ?? path.join(os.homedir(), '.config', 'tickwork');
  return path.join(home, 'tickwork.json');
}

function runInteractive(store: Store, args: string[]): void {
  const app = new TickworkApp({
    store,
    config: loadTimerConfig(store),
    soundEnabled: isSoundEnabled(store),
    write: chunk => process.stdout.write(chunk),
    log: line => console.log(line),
    logError: (message, err) => console.error(`\n${message}:`, err),
  });

  const taskFlag = splitArgs(args).flags.get('task');
  if (taskFlag !== undefined) app.selectTask(parseId(taskFlag === true ? undefined : taskFlag));

  console.log('space start/pause  n next  r reset  s stats  m mute  q quit');

  const quit = (): void => {
    app.shutdown();
    if (process.stdin.isTTY) process.stdin.setRawMode(false);
    process.stdin.pause();
    process.stdout.write('\n');
  };

  readline.emitKeypressEvents(process.stdin);
  if (process.stdin.isTTY) process.stdin.setRawMode(true);
  process.stdin.on('keypress', (str: string | undefined, key: readline.Key | undefined) => {
    if (key?.ctrl && key.name === 'c') {
      quit();
      return;
    }
    if (app.handleKey(key?.name ?? str ?? '') === 'quit') quit();
  });

  app.start();
}

function main(argv: string[]): void {
  const store = new RecordStore(new FileStorage(dataFilePath()));
  const [command = 'start', ...rest] = argv;
  if (command === 'start') {
    runInteractive(store, rest);
    return;
  }
  process.exitCode = runCommand([command, ...rest], { store, log: line => console.log(line) });
}

if (require.main === module) {
  try {
    main(process.argv.slice(2));
  } catch (err) {
    if (err instanceof TickworkError) {
      console.error(`tickwork: ${err.message}`);
    } else {
      console.error('tickwork: unexpected error', err);
    }
    process.exitCode = 1;
  }
}
