/**
 * Batch Dataset Generation Script
 *
 * Runs every scenario in a config file and writes its output, without MCP
 * timeout constraints. A failed scenario is reported and the rest continue.
 *
 * Usage: npx tsx scripts/generate-dataset.ts [config/scenarios.json]
 */

import dotenv from 'dotenv';
dotenv.config();

import { GeminiTextGenerator } from '../src/services/generation/index.js';
import {
  loadScenarioConfigs,
  runScenario,
  writeScenarioOutput,
  type ScenarioStatus,
} from '../src/services/pipeline/index.js';
import { GeneratedProposer } from '../src/services/updates/index.js';

const CONFIG_PATH = process.argv[2] || 'config/scenarios.json';

async function main(): Promise<void> {
  const configs = loadScenarioConfigs(CONFIG_PATH);
  const generator = new GeminiTextGenerator();
  const counts: Record<ScenarioStatus | 'crashed', number> = { completed: 0, rejected: 0, failed: 0, crashed: 0 };

  console.error(`Loaded ${configs.length} scenario(s) from ${CONFIG_PATH}`);

  for (const [index, config] of configs.entries()) {
    const label = config.id ?? `#${index + 1}`;
    console.error(`\n=== Scenario ${index + 1}/${configs.length}: ${label} ===`);
    try {
      const run = await runScenario(config, {
        generator,
        proposer: new GeneratedProposer(generator, config.world_description),
      });
      await writeScenarioOutput(run, config.output_base_dir);
      counts[run.summary.status]++;
    } catch (error) {
      counts.crashed++;
      console.error(`Scenario ${label} crashed:`, error instanceof Error ? error.message : String(error));
    }
  }

  console.error('\n=== Done ===');
  console.error(
    `completed=${counts.completed} rejected=${counts.rejected} failed=${counts.failed} crashed=${counts.crashed}`
  );
  console.error('Generator status:', JSON.stringify(generator.getStatus()));
}

main().catch((error) => {
  console.error('Fatal:', error);
  process.exit(1);
});
