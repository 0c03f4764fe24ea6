import { Command } from 'commander';
import chalk from 'chalk';
import { DEBOUNCE_CONSTANTS } from '../../config/constants.js';
import { parseWatchSettings } from '../../config/settings.js';
import type { WatchCommandSettings } from '../../config/settings.js';
import { newGroupedDebounce } from '../../debounce/index.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { print } from '../../utils/logger.js';
import { openLocationWatcher } from '../../watch/LocationWatcher.js';
import type { LocationWatcher } from '../../watch/LocationWatcher.js';
import { WatchEventType } from '../../watch/types.js';
import type { FileIdentity } from '../../watch/types.js';
import { waitForShutdown } from '../signals.js';

interface WatchCommandOptions {
  debounce?: string;
  maxDelay?: string;
}

const EVENT_COLORS: Record<WatchEventType, (text: string) => string> = {
  [WatchEventType.Created]: chalk.green,
  [WatchEventType.Updated]: chalk.yellow,
  [WatchEventType.Deleted]: chalk.red
};

export function describeEvent(event: WatchEventType, target: string, info: FileIdentity | null, now: Date = new Date()): string {
  const details = info && !info.isDirectory ? ` (${info.size} bytes)` : '';
  return `${now.toISOString()} ${event} ${target}${details}`;
}

export function describeBurst(events: WatchEventType[], target: string, now: Date = new Date()): string {
  const noun = events.length === 1 ? 'event' : 'events';
  return `${now.toISOString()} ${events.length} ${noun} at ${target}: ${events.join(', ')}`;
}

async function printEvents(watcher: LocationWatcher): Promise<void> {
  for await (const event of watcher.events()) {
    print(EVENT_COLORS[event](describeEvent(event, watcher.target, watcher.currentInfo())));
  }
}

async function printBursts(watcher: LocationWatcher, settings: WatchCommandSettings): Promise<void> {
  const stage = newGroupedDebounce<WatchEventType>(settings.debounce, settings.maxDelay);

  const forward = async (): Promise<void> => {
    try {
      for await (const event of watcher.events()) {
        await stage.input.send(event);
      }
    } finally {
      stage.input.close();
    }
  };

  const forwarding = forward();
  for await (const burst of stage.output) {
    print(chalk.cyan(describeBurst(burst, watcher.target)));
  }
  await forwarding;
}

export function registerWatchCommand(program: Command): void {
  program
    .command('watch <path>')
    .description('Report when a file appears at, changes at, or disappears from a path')
    .option('-d, --debounce <ms>', 'group events arriving closer together than this (0 prints each event)', '0')
    .option('-m, --max-delay <ms>', 'longest a burst may hold back output (0 = unbounded)', String(DEBOUNCE_CONSTANTS.DEFAULT_MAX_DELAY_MS))
    .action(async (target: string, options: WatchCommandOptions): Promise<void> => {
      let settings: WatchCommandSettings;
      let watcher: LocationWatcher;

      try {
        settings = parseWatchSettings({ target, debounce: options.debounce, maxDelay: options.maxDelay });
        watcher = openLocationWatcher(settings.target);
      } catch (error) {
        console.error(chalk.red(`❌ Failed to start watcher: ${getErrorMessage(error)}`));
        process.exitCode = 1;
        return;
      }

      await watcher.ready();
      const state = watcher.currentInfo() ? 'present' : 'absent';
      print(chalk.cyan(`👀 Watching ${watcher.target} (currently ${state}). Press Ctrl+C to stop.`));
      if (settings.debounce > 0) {
        print(chalk.gray(`   Debounce: ${settings.debounce}ms, max delay: ${settings.maxDelay || 'none'}`));
      }

      const printing = settings.debounce > 0 ? printBursts(watcher, settings) : printEvents(watcher);

      await Promise.race([waitForShutdown(), printing]);
      print('\nStopping watcher...');
      await watcher.close();
      await printing;
    });
}
