/**
 * Handshake command implementation
 */

import {
  buildAuthorMsg,
  buildNameMsg,
  buildOptionMsg,
  buildUciOkMsg,
  createButtonOption,
  createCheckOption,
  createComboOption,
  createSpinOption,
  createStringOption,
  type OptionMsg,
} from '@knightline/uci';

import { parseCliOptions } from '../cli.js';
import { loadConfig, formatConfig } from '../config/loader.js';
import type { EngineConfigSchema, EngineOptionConfig } from '../config/schema.js';
import { handleError } from '../errors/index.js';
import { Reporter } from '../output/reporter.js';

/**
 * Convert a configured engine option into an option message descriptor
 */
export function toOptionMsg(option: EngineOptionConfig): OptionMsg {
  switch (option.type) {
    case 'check':
      return createCheckOption(option.name, option.default);
    case 'spin':
      return createSpinOption(option.name, String(option.default), option.min, option.max);
    case 'combo':
      return createComboOption(option.name, option.default, option.vars);
    case 'button':
      return createButtonOption(option.name);
    case 'string':
      return createStringOption(option.name, option.default);
  }
}

/**
 * Build the engine's reply to `uci`: identity, options, then `uciok`
 */
export function buildHandshake(engine: EngineConfigSchema): string[] {
  return [
    buildNameMsg(engine.name),
    buildAuthorMsg(engine.author),
    ...engine.options.map((option) => buildOptionMsg(toOptionMsg(option))),
    buildUciOkMsg(),
  ];
}

/**
 * Main handshake command handler
 */
export async function handshakeCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);

  try {
    const config = await loadConfig(options);
    const reporter = new Reporter({ color: config.output.color });

    if (options.showConfig) {
      reporter.result(formatConfig(config));
      return;
    }

    for (const line of buildHandshake(config.engine)) {
      reporter.result(line);
    }
  } catch (error) {
    handleError(error);
  }
}
