import type { Command } from '../types.js';
import { loadConfig, validateExternalConfig } from '../../config/loader.js';
import { exitWithUsage } from '../utils.js';

const USAGE = 'recipe-finder config <show|validate>';

export const configCommand: Command = {
  name: 'config',
  description: 'Show or validate configuration',
  usage: USAGE,
  handler: async (args) => {
    const subcommand = args[0];

    switch (subcommand) {
      case 'show': {
        const config = loadConfig();
        console.log(JSON.stringify(config, null, 2));
        break;
      }
      case 'validate': {
        const config = loadConfig();
        const errors = validateExternalConfig(config);
        if (errors.length === 0) {
          console.log('Configuration is valid.');
        } else {
          console.error('Configuration errors:');
          for (const error of errors) {
            console.error(`  - ${error}`);
          }
          process.exit(3);
        }
        break;
      }
      default:
        exitWithUsage('Unknown subcommand', USAGE);
    }
  },
};
