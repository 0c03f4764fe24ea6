import { Command } from 'commander';
import chalk from 'chalk';
import { DEBOUNCE_CONSTANTS } from '../../config/constants.js';
import { parseConfigSettings } from '../../config/settings.js';
import type { ConfigCommandSettings } from '../../config/settings.js';
import { ConfigLoader } from '../../reload/ConfigLoader.js';
import type { ConfigLoaderOptions } from '../../reload/ConfigLoader.js';
import type { ConfigObject } from '../../reload/parse.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { print } from '../../utils/logger.js';
import { waitForShutdown } from '../signals.js';

interface ConfigCommandOptions {
  debounce?: string;
  maxDelay?: string;
  keepLastValid?: boolean;
  strict?: boolean;
}

function displayConfig(config: ConfigObject, title: string): void {
  if (Object.keys(config).length === 0) {
    print(chalk.gray(`  ${title}: (empty)`));
    return;
  }

  print(chalk.bold(`  ${title}:`));
  print(`  ${JSON.stringify(config, null, 2).split('\n').join('\n  ')}`);
}

export function registerConfigCommand(program: Command): void {
  program
    .command('config <file>')
    .description('Load a JSON or YAML config file and print it again whenever it changes')
    .option('-d, --debounce <ms>', 'quiet time before reloading (0 reloads on every change)', String(DEBOUNCE_CONSTANTS.DEFAULT_INTERVAL_MS))
    .option('-m, --max-delay <ms>', 'longest continuous changes may postpone a reload (0 = unbounded)', String(DEBOUNCE_CONSTANTS.DEFAULT_MAX_DELAY_MS))
    .option('--keep-last-valid', 'keep the last valid config when a reload fails')
    .option('--strict', 'reject fields the file did not have when first loaded')
    .action(async (file: string, options: ConfigCommandOptions): Promise<void> => {
      let settings: ConfigCommandSettings;

      try {
        settings = parseConfigSettings({
          file,
          debounce: options.debounce,
          maxDelay: options.maxDelay,
          keepLastValid: options.keepLastValid === true,
          strict: options.strict === true
        });
      } catch (error) {
        console.error(chalk.red(`❌ ${getErrorMessage(error)}`));
        process.exitCode = 1;
        return;
      }

      const loaderOptions: ConfigLoaderOptions<ConfigObject> = {
        keepLastValid: settings.keepLastValid,
        debounceIntervalMs: settings.debounce,
        debounceMaxDelayMs: settings.maxDelay,
        errorHandlers: [(error) => console.error(chalk.red(`❌ ${error.message}`))],
        reloadHandlers: [(config) => displayConfig(config, `Reloaded ${new Date().toISOString()}`)]
      };

      let loader: ConfigLoader<ConfigObject>;
      try {
        loader = await ConfigLoader.create<ConfigObject>(settings.file, {}, loaderOptions);

        if (settings.strict) {
          // With empty defaults, strict mode is anchored on the fields of the first load
          const initial = loader.get();
          await loader.close();
          loader = await ConfigLoader.create<ConfigObject>(settings.file, initial, { ...loaderOptions, strictParsing: true });
        }
      } catch (error) {
        console.error(chalk.red(`❌ Failed to load config: ${getErrorMessage(error)}`));
        process.exitCode = 1;
        return;
      }

      displayConfig(loader.get(), 'Loaded');
      await loader.ready();
      print(chalk.cyan(`👀 Watching ${loader.filename}. Press Ctrl+C to stop.`));

      await waitForShutdown();
      print('\nStopping config watcher...');
      await loader.close();
    });
}
