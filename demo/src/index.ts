/**
 * Command-line driver for the red-black tree
 *
 * Loads a named key sequence from samples.json, builds the tree, prints it in
 * pre-order and looks up the configured keys. Settings come from the
 * environment (see .env.example); LOG_LEVEL=debug traces every fix-up case.
 */

import dotenv from 'dotenv';
// Load environment variables from .env file
dotenv.config();
import { ConfigError, loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { loadSamples } from './sample-loader.js';
import { runDemo } from './demo-runner.js';
import { getErrorMessage } from './utils/error-utils.js';

async function start(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);

  try {
    const samples = await loadSamples(config.samplesFile);
    const sample = samples.get(config.sample);
    if (!sample) {
      throw new ConfigError(`Unknown SAMPLE "${config.sample}", expected one of ${[...samples.keys()].join(', ')}`);
    }

    const tree = runDemo(sample, config.searchKeys, { logger, write: line => console.log(line) });
    if (!tree.validate().valid) {
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error(`Demo failed: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  }
}

start().catch((error: unknown) => {
  console.error(`Invalid configuration: ${getErrorMessage(error)}`);
  process.exitCode = 1;
});
