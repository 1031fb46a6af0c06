/**
 * Configuration Management MCP Tools
 *
 * Tools: kb_config_get, kb_config_set
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/config
 */

import type { z } from 'zod';
import { getConfig, state, updateConfig } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validationError } from '../server/errors.js';
import { loadGenerationConfig } from '../services/generation/config.js';
import { validateInput, ConfigGetInput, ConfigSetInput, ConfigKey } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

type ConfigKeyName = z.infer<typeof ConfigKey>;

function getConfigValue(key: ConfigKeyName): string | number {
  const config = getConfig();
  switch (key) {
    case 'output_dir':
      return config.outputDir;
    case 'default_radius':
      return config.defaultRadius;
    case 'default_seed':
      return config.defaultSeed;
    case 'focal_concurrency':
      return config.focalConcurrency;
  }
}

function requireInteger(key: ConfigKeyName, value: unknown, min: number, max: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw validationError(`${key} must be an integer between ${min} and ${max}`, { value });
  }
  return value;
}

function requireString(key: ConfigKeyName, value: unknown): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw validationError(`${key} must be a non-empty string`, { value });
  }
  return value;
}

function setConfigValue(key: ConfigKeyName, value: string | number | boolean): void {
  switch (key) {
    case 'output_dir':
      updateConfig({ outputDir: requireString(key, value) });
      break;
    case 'default_radius':
      updateConfig({ defaultRadius: requireInteger(key, value, 0, 4) });
      break;
    case 'default_seed':
      updateConfig({ defaultSeed: requireString(key, value) });
      break;
    case 'focal_concurrency':
      updateConfig({ focalConcurrency: requireInteger(key, value, 1, 16) });
      break;
  }
}

/**
 * Generation settings without the API key
 */
function describeGeneration(): Record<string, unknown> {
  if (!process.env.GEMINI_API_KEY) {
    return { configured: false };
  }
  const { apiKey: _apiKey, ...rest } = loadGenerationConfig();
  return { configured: true, ...rest };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigGetInput, params);

    if (input.key) {
      return formatResponse(successResult({ key: input.key, value: getConfigValue(input.key) }));
    }

    const config = getConfig();
    return formatResponse(successResult({
      output_dir: config.outputDir,
      default_radius: config.defaultRadius,
      default_seed: config.defaultSeed,
      focal_concurrency: config.focalConcurrency,
      graph_loaded: state.currentGraph !== null,
      graph_source: state.currentGraphSource,
      generation: describeGeneration(),
    }));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConfigSet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigSetInput, params);
    setConfigValue(input.key, input.value);
    console.error(`[Config] ${input.key} set to ${String(input.value)}`);
    return formatResponse(successResult({ key: input.key, value: getConfigValue(input.key), updated: true }));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export const configTools: Record<string, ToolDefinition> = {
  'kb_config_get': {
    description: 'Get server configuration (output directory, default radius and seed, focal concurrency) and the generation settings',
    inputSchema: ConfigGetInput.shape,
    handler: handleConfigGet,
  },
  'kb_config_set': {
    description: 'Set one server configuration value',
    inputSchema: ConfigSetInput.shape,
    handler: handleConfigSet,
  },
};
