/**
 * Dataset Packager
 *
 * Writes a scenario run to disk as self-contained structured records:
 *
 * ```
 * <base>/<scenario_id>/
 *   summary.json
 *   graph.json                      (not written for a rejected scenario)
 *   memory_<hex>/
 *     documents/<key>.md
 *     base_memory.json
 *     retrieval_questions.json
 *     update_queries.json
 * ```
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/pipeline/packager
 */

import * as path from 'path';
import type { QueryRecord } from '../../models/query.js';
import { HOP_DISTANCES } from '../../models/query.js';
import type { UpdateScenario } from '../../models/update.js';
import { computeHash } from '../../utils/hash.js';
import { ensureDirectory, sanitizePath, writeJsonFile, writeTextFile } from '../../utils/files.js';
import { exportGraph } from '../knowledge-graph/export-service.js';
import { renderMarkdownFiles } from '../rendering/markdown.js';
import { formatUpdatePath } from '../updates/update-simulator.js';
import type { FocalNodeResult, ScenarioRunResult } from './scenario-runner.js';

export interface PackagedMemory {
  memory_id: string;
  directory: string;
  files_written: string[];
}

export interface PackageResult {
  scenario_dir: string;
  files_written: string[];
  memories: PackagedMemory[];
}

/** `0_hop`, `1_hop`, `2_hop` */
export function hopKey(hop: number): string {
  return `${hop}_hop`;
}

function groupByHop<T, R>(items: readonly T[], hopOf: (item: T) => number, map: (item: T) => R): Record<string, R[]> {
  const grouped: Record<string, R[]> = {};
  for (const hop of HOP_DISTANCES) {
    grouped[hopKey(hop)] = items.filter((item) => hopOf(item) === hop).map(map);
  }
  return grouped;
}

function updateRecord(scenario: UpdateScenario): Record<string, unknown> {
  return {
    ...scenario,
    old_path_tokens: formatUpdatePath(scenario.old_path),
    new_path_tokens: formatUpdatePath(scenario.new_path),
  };
}

async function writeMemory(scenarioDir: string, result: FocalNodeResult): Promise<PackagedMemory> {
  const memoryDir = sanitizePath(result.memory_id, scenarioDir);
  const documentsDir = path.join(memoryDir, 'documents');
  const written: string[] = [];
  await ensureDirectory(memoryDir);

  const files = result.documents ? renderMarkdownFiles(result.documents) : [];
  for (const file of files) {
    const target = sanitizePath(file.path, documentsDir);
    await writeTextFile(target, file.content);
    written.push(target);
  }

  const baseMemoryPath = path.join(memoryDir, 'base_memory.json');
  await writeJsonFile(baseMemoryPath, {
    memory_id: result.memory_id,
    focal_node_id: result.node_id,
    focal_name: result.name,
    radius: result.documents?.radius ?? null,
    documents: result.documents?.documents ?? [],
    files: files.map((file) => ({
      key: file.key,
      path: `documents/${file.path}`,
      content_hash: computeHash(file.content),
    })),
  });
  written.push(baseMemoryPath);

  const queriesPath = path.join(memoryDir, 'retrieval_questions.json');
  const records: QueryRecord[] = result.queries?.records ?? [];
  await writeJsonFile(queriesPath, {
    focal_node_id: result.node_id,
    questions: groupByHop(records, (r) => r.hop_distance, (r) => r),
    shortfalls: result.queries?.shortfalls ?? [],
  });
  written.push(queriesPath);

  const updatesPath = path.join(memoryDir, 'update_queries.json');
  await writeJsonFile(updatesPath, {
    focal_node_id: result.node_id,
    updates: groupByHop(result.updates, (u) => u.hop_distance, updateRecord),
    skipped: result.skipped,
  });
  written.push(updatesPath);

  return { memory_id: result.memory_id, directory: memoryDir, files_written: written };
}

/**
 * Write every artifact of a scenario run under `baseDir/<scenario_id>`.
 */
export async function writeScenarioOutput(run: ScenarioRunResult, baseDir: string): Promise<PackageResult> {
  const scenarioDir = sanitizePath(run.summary.scenario_id, baseDir);
  await ensureDirectory(scenarioDir);
  const filesWritten: string[] = [];
  const memories: PackagedMemory[] = [];

  if (run.graph && run.summary.status !== 'rejected') {
    filesWritten.push(...exportGraph(run.graph, path.join(scenarioDir, 'graph.json')).files_written);
  }

  for (const result of run.focal_results) {
    if (result.status === 'failed' && !result.documents) continue;
    const memory = await writeMemory(scenarioDir, result);
    memories.push(memory);
    filesWritten.push(...memory.files_written);
  }

  const summaryPath = path.join(scenarioDir, 'summary.json');
  await writeJsonFile(summaryPath, run.summary);
  filesWritten.push(summaryPath);

  console.error(`[Packager] Wrote ${filesWritten.length} file(s) to ${scenarioDir}`);
  return { scenario_dir: scenarioDir, files_written: filesWritten, memories };
}
