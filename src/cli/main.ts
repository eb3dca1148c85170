#!/usr/bin/env node

import {cosmiconfig} from 'cosmiconfig';

import type {ResolvedConfig} from '../library/index.js';
import {getErrorMessage} from '../library/@utils/index.js';
import {ConfigError, parseConfig, setup} from '../library/index.js';

const configExplorer = cosmiconfig('dyndnsd');

const configPath = process.argv[2] as string | undefined;

const result =
  configPath === undefined
    ? await configExplorer.search()
    : await configExplorer.load(configPath);

if (!result) {
  console.error('config file not found.');
  process.exit(1);
}

let config: ResolvedConfig;

try {
  config = parseConfig(result.config);
} catch (error) {
  if (!(error instanceof ConfigError)) {
    throw error;
  }

  console.error(`${result.filepath}: ${error.message}`);
  process.exit(1);
}

const scheduler = await setup(config).catch(error => {
  console.error(`failed to start: ${getErrorMessage(error)}`);
  process.exit(1);
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    void scheduler.stop().then(() => process.exit(0));
  });
}
