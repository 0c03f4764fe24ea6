import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { resolveLogLevel } from '../config/settings.js';
import { logger } from '../utils/logger.js';
import { registerConfigCommand } from './commands/config-cmd.js';
import { registerWatchCommand } from './commands/watch-cmd.js';

function readPackageVersion(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const packageJsonPath = path.join(__dirname, '..', '..', 'package.json');
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  if (packageJson && typeof packageJson === 'object' && 'version' in packageJson && typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return '0.0.0';
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('pathwatch')
    .description('Watch filesystem locations and debounced config reloads')
    .version(readPackageVersion())
    .option('--log-level <level>', 'log level (debug|info|warn|error|silent)');

  program.hook('preAction', (thisCommand) => {
    const level = resolveLogLevel(thisCommand.opts());
    if (level !== undefined) {
      logger.setLevel(level);
    }
  });

  registerWatchCommand(program);
  registerConfigCommand(program);

  return program;
}

export async function runCli(argv = process.argv): Promise<void> {
  const program = createProgram();

  if (!argv || argv.length <= 2) {
    program.help();
    return;
  }

  await program.parseAsync(argv);
}
