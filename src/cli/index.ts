#!/usr/bin/env node
/**
 * Trellis CLI
 *
 * Inspect style presets, preview reconciliation and validate config files
 */

import { readFileSync } from 'fs';
import { program } from 'commander';
import { parseAppConfig, parseWindowConfig } from '../host/config';
import { PRESET_NAMES } from '../shared/style';
import { errorMessage } from '../shared/errors';
import { VERSION } from '../version';
import { formatPlan, planStyle } from './plan';

function readJson(file: string): unknown {
  return JSON.parse(readFileSync(file, 'utf8'));
}

program
  .name('trellis')
  .description('Trellis CLI - window styles and bridge configuration for hosted web views')
  .version(VERSION);

program
  .command('presets')
  .description('List the built-in style presets')
  .action(() => {
    for (const name of PRESET_NAMES) {
      console.log(name);
    }
  });

program
  .command('plan')
  .description('Print the provider operations a fresh window receives, then its page CSS')
  .argument('[styleFile]', 'JSON file with a partial window style')
  .option('-p, --preset <name>', `Style preset (${PRESET_NAMES.join(', ')})`)
  .option('--platform <name>', 'Platform to emulate: macos, windows or linux')
  .option('--debug', 'Log skipped operations')
  .action((styleFile: string | undefined, opts: { preset?: string; platform?: string; debug?: boolean }) => {
    try {
      const style = styleFile === undefined ? {} : readJson(styleFile);
      console.log(formatPlan(planStyle(style, { ...opts })));
    } catch (error) {
      console.error('Plan failed:', errorMessage(error));
      process.exit(1);
    }
  });

program
  .command('check-config')
  .description('Validate an app config file (or a window config with --window)')
  .argument('<file>', 'JSON config file')
  .option('-w, --window', 'Validate as a window config')
  .action((file: string, opts: { window?: boolean }) => {
    try {
      const input = readJson(file);
      const result = opts.window ? parseWindowConfig(input) : parseAppConfig(input);
      if (!result.ok) {
        console.error(`${file} is invalid:`);
        for (const issue of result.issues) {
          console.error(`  - ${issue}`);
        }
        process.exit(1);
      }
      console.log(`${file} is a valid ${opts.window ? 'window' : 'app'} config`);
    } catch (error) {
      console.error('Check failed:', errorMessage(error));
      process.exit(1);
    }
  });

program.parse();
