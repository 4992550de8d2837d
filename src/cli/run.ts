/**
 * Wiring between stratum commands and Commander: options from layers,
 * the standard source chain, logger setup and error exit codes.
 */

import type { Command as CommanderCommand } from 'commander';
import type { Command } from '../core/commands/types.js';
import { executeCommand } from '../core/commands/execute.js';
import { getConfigFileLocations } from '../core/config.js';
import { COMMAND_SETTINGS_LAYER, createCommandSettingsLayer } from '../core/layers/command-settings.js';
import { LOGGING_LAYER, createLoggingLayer, getLoggingConfig } from '../core/layers/logging.js';
import { OUTPUT_LAYER } from '../core/layers/output.js';
import { getLogger, initLogger } from '../core/logger.js';
import type { ParameterLayer } from '../core/parameters/layer.js';
import type { ParameterTypeRegistry } from '../core/parameters/registry.js';
import { resolveParameters } from '../core/resolution/engine.js';
import { streamDestination } from '../core/rows/destination.js';
import { SourceChain, traceContributions } from '../core/sources/chain.js';
import { configFileSource } from '../core/sources/config-file.js';
import {
  cliSource,
  defaultsSource,
  envKey,
  envSource,
  onlyLayers,
  overrideSource,
  whenUnset,
  type CliValues,
  type SourceProvider,
} from '../core/sources/providers.js';
import { collectCliValues, registerLayerOptions } from './parameters.js';
import { cliError } from './renderers/index.js';
import { supportsColor } from './renderers/colors.js';

/** Environment variable prefix: STRATUM_OUTPUT, STRATUM_LOG_LEVEL, ... */
export const ENV_PREFIX = 'STRATUM';

type Env = Readonly<Record<string, string | undefined>>;

const definitions = new WeakMap<CommanderCommand, Command>();

/** Layers every CLI command carries besides its own. */
export function standardLayers(registry: ParameterTypeRegistry): ParameterLayer[] {
  return [createLoggingLayer(registry), createCommandSettingsLayer(registry)];
}

/**
 * The CLI's source chain, lowest precedence first: layer defaults, config
 * files (global, project, --config-file), STRATUM_* variables, flags.
 * Table color follows the terminal unless set explicitly.
 */
export function buildSources(cli: CliValues, env: Env = process.env, stdoutIsTTY = process.stdout.isTTY === true): SourceProvider[] {
  const fromCli = cli[COMMAND_SETTINGS_LAYER]?.['config-file'];
  const explicit = typeof fromCli === 'string' ? fromCli : env[envKey(ENV_PREFIX, '', 'config-file')];

  return [
    defaultsSource(),
    configFileSource(getConfigFileLocations(explicit)),
    envSource(ENV_PREFIX, env),
    cliSource(cli),
    whenUnset(onlyLayers([OUTPUT_LAYER], overrideSource({
      [OUTPUT_LAYER]: { color: supportsColor({ isTTY: stdoutIsTTY }, env) },
    }))),
  ];
}

/** Initialize logging from the logging layer of the command about to run. */
export async function initCommandLogger(actionCommand: CommanderCommand): Promise<void> {
  const command = definitions.get(actionCommand);
  const layer = command?.layers.find(l => l.slug === LOGGING_LAYER);
  if (!layer) return;
  const parsed = await resolveParameters([layer], new SourceChain(buildSources(collectCliValues(actionCommand))));
  initLogger(getLoggingConfig(parsed));
}

/** Register a stratum command as a Commander subcommand. */
export function registerCommand(program: CommanderCommand, command: Command): CommanderCommand {
  const sub = program.command(command.name);
  if (command.description) sub.description(command.description);
  registerLayerOptions(sub, command.layers);
  definitions.set(sub, command);

  sub.action(async () => {
    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort();
    process.once('SIGINT', onInterrupt);
    try {
      await executeCommand(command, {
        sources: new SourceChain(buildSources(collectCliValues(sub)), { middleware: [traceContributions()] }),
        destination: streamDestination(process.stdout),
        signal: controller.signal,
      });
    } catch (err) {
      getLogger('cli').debug({ err, command: command.name }, 'command failed');
      process.exitCode = cliError(err);
    } finally {
      process.off('SIGINT', onInterrupt);
    }
  });
  return sub;
}
