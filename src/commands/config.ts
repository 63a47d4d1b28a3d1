/**
 * Config commands
 */

import { Command } from 'commander';
import { ConfigManager } from '../config/index.js';
import { getOutputOptions, output, outputError, outputSuccess } from '../utils/output.js';

export function createConfigCommand(getConfigPath: () => string): Command {
  const cmd = new Command('config')
    .description('Manage schedex configuration');

  cmd
    .command('path')
    .description('Show the config file path')
    .action(() => {
      const configPath = getConfigPath();
      output({ path: configPath }, configPath);
    });

  cmd
    .command('init')
    .description('Initialize a new config file')
    .option('-f, --force', 'Overwrite existing config')
    .option('-p, --path <path>', 'Custom config path')
    .action(async (options: { force?: boolean; path?: string }) => {
      try {
        const manager = new ConfigManager(options.path || getConfigPath());
        const result = await manager.init(options.force);

        if (result.created) {
          outputSuccess(`Config created at: ${result.path}`);
        } else {
          output(
            { exists: true, path: result.path },
            `Config already exists at: ${result.path}\nUse --force to overwrite.`
          );
        }
      } catch (error) {
        outputError('Failed to initialize config', error);
        process.exit(1);
      }
    });

  cmd
    .command('show')
    .description('Show the effective config (defaults when no file exists)')
    .action(async () => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const config = await manager.loadOrDefault();

        if (getOutputOptions().json) {
          output(config);
        } else {
          if (!(await manager.exists())) {
            console.log(`# No config at ${manager.getConfigPath()}; showing defaults`);
          }
          console.log(JSON.stringify(config, null, 2));
        }
      } catch (error) {
        outputError('Failed to load config', error);
        process.exit(1);
      }
    });

  cmd
    .command('validate')
    .description('Validate the config file')
    .action(async () => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const result = await manager.validate();

        if (result.valid) {
          outputSuccess('Config is valid');
        } else {
          output(
            { valid: false, errors: result.errors },
            `Config validation failed:\n${result.errors.map(e => `  - ${e.path}: ${e.message}`).join('\n')}`
          );
          process.exit(1);
        }
      } catch (error) {
        outputError('Failed to validate config', error);
        process.exit(1);
      }
    });

  return cmd;
}
