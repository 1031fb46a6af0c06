/**
 * Scenario Pipeline Services
 */

export {
  ScenarioConfigSchema,
  ScenarioConfigListSchema,
  DEFAULT_UPDATE_PLAN,
  parseScenarioConfig,
  loadScenarioConfigs,
} from './scenario-config.js';

export type { ScenarioConfig, ScenarioConfigInput } from './scenario-config.js';

export { runScenario, runFocalPass, selectFocalNodes, summarizeFocalResult } from './scenario-runner.js';

export type {
  ScenarioStatus,
  FocalNodeStatus,
  SkippedArtifact,
  FocalNodeResult,
  FocalNodeSummary,
  ScenarioSummary,
  ScenarioRunResult,
  RunScenarioOptions,
} from './scenario-runner.js';

export { writeScenarioOutput, hopKey } from './packager.js';

export type { PackageResult, PackagedMemory } from './packager.js';
