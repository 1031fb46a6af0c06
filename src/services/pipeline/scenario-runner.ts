/**
 * Scenario Runner
 *
 * Runs one world scenario end to end: build (or reuse) a graph, validate it,
 * then run an isolated pass per selected person: render the neighborhood,
 * derive queries, simulate updates. A pass that fails is recorded on its
 * focal node; siblings and other scenarios continue.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/pipeline/scenario-runner
 */

import { v4 as uuidv4 } from 'uuid';
import type { DocumentSet } from '../../models/document.js';
import { USER_DOCUMENT_KEY, getDocument } from '../../models/document.js';
import type { GraphStats, KnowledgeNode } from '../../models/knowledge-graph.js';
import type { QueryDerivation } from '../../models/query.js';
import type { UpdateScenario } from '../../models/update.js';
import { KnowledgeBaseError, type ErrorCategory } from '../../server/errors.js';
import { forkRng, sampleIndices, type SeedValue } from '../../utils/random.js';
import { ConcurrencyLimiter } from '../generation/limiter.js';
import type { TextGenerator } from '../generation/types.js';
import type { KnowledgeGraph } from '../knowledge-graph/graph.js';
import { validateGraph, type GraphViolation } from '../knowledge-graph/validator.js';
import { phraseQueries } from '../queries/phrasing.js';
import { deriveQueries } from '../queries/query-deriver.js';
import { renderMarkdown } from '../rendering/markdown.js';
import { renderNeighborhood } from '../rendering/renderer.js';
import { phraseUpdate } from '../updates/phrasing.js';
import type { MutationProposer } from '../updates/proposer.js';
import { simulateUpdate } from '../updates/update-simulator.js';
import { buildWorldGraph, type EnrichmentFailure, type SkippedEdge } from '../world/build-driver.js';
import type { ScenarioConfig } from './scenario-config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type ScenarioStatus = 'completed' | 'rejected' | 'failed';
export type FocalNodeStatus = 'succeeded' | 'partial' | 'failed';

export interface SkippedArtifact {
  artifact: string;
  category: ErrorCategory;
  message: string;
}

export interface FocalNodeResult {
  node_id: string;
  name: string;
  memory_id: string;
  status: FocalNodeStatus;
  documents: DocumentSet | null;
  queries: QueryDerivation | null;
  updates: UpdateScenario[];
  skipped: SkippedArtifact[];
}

export interface FocalNodeSummary {
  node_id: string;
  name: string;
  memory_id: string;
  status: FocalNodeStatus;
  documents: number;
  queries: number;
  updates: number;
  skipped: SkippedArtifact[];
}

export interface ScenarioSummary {
  scenario_id: string;
  world_description: string;
  seed: SeedValue;
  status: ScenarioStatus;
  violations: GraphViolation[];
  error?: SkippedArtifact;
  graph_stats: GraphStats | null;
  /** Generated edges the build could not add */
  skipped_edges: SkippedEdge[];
  /** Nodes whose attributes could not be generated */
  enrichment_failures: EnrichmentFailure[];
  focal_nodes: FocalNodeSummary[];
}

export interface ScenarioRunResult {
  summary: ScenarioSummary;
  /** null only when the build itself failed */
  graph: KnowledgeGraph | null;
  focal_results: FocalNodeResult[];
}

export interface RunScenarioOptions {
  /** Required to build a graph and to phrase queries and updates */
  generator?: TextGenerator;
  /** Use this graph instead of building one */
  graph?: KnowledgeGraph;
  proposer?: MutationProposer;
  /** Scenario, memory and placeholder ids */
  idFactory?: () => string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function toSkipped(artifact: string, error: unknown): SkippedArtifact {
  const kbError = KnowledgeBaseError.fromUnknown(error);
  return { artifact, category: kbError.category, message: kbError.message };
}

export function summarizeFocalResult(result: FocalNodeResult): FocalNodeSummary {
  return {
    node_id: result.node_id,
    name: result.name,
    memory_id: result.memory_id,
    status: result.status,
    documents: result.documents ? result.documents.documents.length : 0,
    queries: result.queries ? result.queries.records.length : 0,
    updates: result.updates.length,
    skipped: result.skipped,
  };
}

/**
 * Pick up to `count` people as focal nodes, reproducibly for a seed.
 */
export function selectFocalNodes(graph: KnowledgeGraph, count: number, seed: SeedValue): KnowledgeNode[] {
  const people = graph.persons();
  if (people.length < count) {
    console.error(
      `[ScenarioRunner] WARN only ${people.length} person node(s) for ${count} requested iteration(s)`
    );
  }
  const indices = sampleIndices(forkRng(seed, 'focal-selection'), people.length, Math.min(count, people.length));
  return indices.map((i) => people[i]);
}

// ═══════════════════════════════════════════════════════════════════════════════
// FOCAL PASS
// ═══════════════════════════════════════════════════════════════════════════════

interface FocalPassContext {
  graph: KnowledgeGraph;
  config: ScenarioConfig;
  seed: SeedValue;
  generator?: TextGenerator;
  proposer?: MutationProposer;
  idFactory: () => string;
}

/**
 * One focal node: documents, then queries, then every planned update.
 * Artifact failures are collected; only a rendering failure fails the pass.
 */
export async function runFocalPass(context: FocalPassContext, focal: KnowledgeNode): Promise<FocalNodeResult> {
  const { graph, config, seed, generator } = context;
  const result: FocalNodeResult = {
    node_id: focal.id,
    name: focal.name,
    memory_id: `memory_${context.idFactory().replace(/-/g, '')}`,
    status: 'succeeded',
    documents: null,
    queries: null,
    updates: [],
    skipped: [],
  };

  let documents: DocumentSet;
  try {
    documents = renderNeighborhood(graph, focal.id, { radius: config.radius });
    result.documents = documents;
  } catch (error) {
    result.skipped.push(toSkipped('documents', error));
    result.status = 'failed';
    return result;
  }

  try {
    const derivation = deriveQueries(graph, focal.id, {
      counts: { 1: config.num_qa_per_iter, 2: config.num_qa_per_iter },
      rng: forkRng(seed, `queries:${focal.id}`),
    });
    result.queries = derivation;

    const userDocument = getDocument(documents, USER_DOCUMENT_KEY);
    if (config.phrase && generator && userDocument) {
      try {
        derivation.records = await phraseQueries(generator, {
          focalName: focal.name,
          personalInfo: renderMarkdown(userDocument),
          records: derivation.records,
        });
      } catch (error) {
        result.skipped.push(toSkipped('query_phrasing', error));
      }
    }
  } catch (error) {
    result.skipped.push(toSkipped('queries', error));
  }

  for (const [slot, hop] of config.update_plan.entries()) {
    const artifact = `update[${slot}] hop ${hop}`;
    try {
      const scenario = await simulateUpdate(graph, documents, focal.id, {
        rng: forkRng(seed, `update:${focal.id}:${slot}`),
        hop,
        proposer: context.proposer,
        idFactory: context.idFactory,
      });
      if (config.phrase && generator) {
        try {
          scenario.instructions = await phraseUpdate(generator, scenario, focal.name);
        } catch (error) {
          result.skipped.push(toSkipped(`${artifact} phrasing`, error));
        }
      }
      result.updates.push(scenario);
    } catch (error) {
      result.skipped.push(toSkipped(artifact, error));
    }
  }

  if (result.skipped.length > 0) {
    result.status = 'partial';
    console.error(`[ScenarioRunner] WARN ${focal.name}: ${result.skipped.length} artifact(s) skipped`);
  }
  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCENARIO
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run one scenario. Never throws for build, validation or per-node failures;
 * they are reported in the summary.
 */
export async function runScenario(config: ScenarioConfig, options: RunScenarioOptions = {}): Promise<ScenarioRunResult> {
  const idFactory = options.idFactory ?? uuidv4;
  const scenarioId = config.id ?? idFactory();
  const seed: SeedValue = config.seed ?? scenarioId;
  const summary: ScenarioSummary = {
    scenario_id: scenarioId,
    world_description: config.world_description,
    seed,
    status: 'completed',
    violations: [],
    graph_stats: null,
    skipped_edges: [],
    enrichment_failures: [],
    focal_nodes: [],
  };

  console.error(`[ScenarioRunner] Scenario ${scenarioId}: ${config.world_description}`);

  let graph: KnowledgeGraph;
  if (options.graph) {
    graph = options.graph;
  } else if (options.generator) {
    try {
      const built = await buildWorldGraph(options.generator, {
        worldDescription: config.world_description,
        numPeople: config.num_people,
        numEntities: config.num_entities,
      });
      graph = built.graph;
      summary.skipped_edges = built.skipped_edges;
      summary.enrichment_failures = built.enrichment_failures;
    } catch (error) {
      summary.status = 'failed';
      summary.error = toSkipped('graph', error);
      console.error(`[ScenarioRunner] Scenario ${scenarioId} failed to build: ${summary.error.message}`);
      return { summary, graph: null, focal_results: [] };
    }
  } else {
    summary.status = 'failed';
    summary.error = {
      artifact: 'graph',
      category: 'VALIDATION_ERROR',
      message: 'A text generator is required when no graph is supplied',
    };
    return { summary, graph: null, focal_results: [] };
  }

  summary.graph_stats = graph.getStats();
  const validation = validateGraph(graph);
  if (!validation.ok) {
    summary.status = 'rejected';
    summary.violations = validation.violations;
    console.error(
      `[ScenarioRunner] Scenario ${scenarioId} rejected: ${validation.violations.length} violation(s)\n` +
        validation.violations.map((v) => `  - [${v.invariant}] ${v.message}`).join('\n')
    );
    return { summary, graph, focal_results: [] };
  }

  const focalNodes = selectFocalNodes(graph, config.num_iter_per_graph, seed);
  const context: FocalPassContext = {
    graph,
    config,
    seed,
    generator: options.generator,
    proposer: options.proposer,
    idFactory,
  };

  const limiter = new ConcurrencyLimiter(config.focal_concurrency);
  const settled = await limiter.mapSettled(focalNodes, (focal) => runFocalPass(context, focal));

  const focalResults = settled.map((outcome, index): FocalNodeResult => {
    if (outcome.status === 'fulfilled') return outcome.value;
    const focal = focalNodes[index];
    return {
      node_id: focal.id,
      name: focal.name,
      memory_id: `memory_${idFactory().replace(/-/g, '')}`,
      status: 'failed',
      documents: null,
      queries: null,
      updates: [],
      skipped: [toSkipped('focal_pass', outcome.reason)],
    };
  });

  summary.focal_nodes = focalResults.map(summarizeFocalResult);
  if (focalResults.length > 0 && focalResults.every((r) => r.status === 'failed')) {
    summary.status = 'failed';
  }

  const succeeded = focalResults.filter((r) => r.status !== 'failed').length;
  console.error(
    `[ScenarioRunner] Scenario ${scenarioId} ${summary.status}: ${succeeded}/${focalResults.length} focal node(s) produced output`
  );
  return { summary, graph, focal_results: focalResults };
}
