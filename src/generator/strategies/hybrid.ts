import type { FeatureT, ParsedDocumentT } from "../../schemas/document.js";
import { log } from "../../utils/telemetry.js";
import { isComplexFeature } from "../complexity.js";
import {
  dedupeSegments,
  finishGraph,
  stitchSegments,
  type AssemblyContext,
  type SegmentGraph,
} from "../graph-assembler.js";
import { IdAllocator } from "../id-allocator.js";
import { NamespaceAccumulator } from "../namespace.js";
import { buildChunkSegments } from "./chunked.js";
import { buildSimpleSegment } from "./simple.js";
import { resolveSettings, type GenerateOptions, type GenerationResult, type GenerationStrategy } from "./types.js";

export interface FeatureRun {
  complex: boolean;
  features: FeatureT[];
}

/**
 * Document-order runs: each complex feature alone, consecutive simple
 * features together.
 */
export function planRuns(features: readonly FeatureT[], threshold: number): FeatureRun[] {
  const runs: FeatureRun[] = [];
  for (const feature of features) {
    const complex = isComplexFeature(feature, threshold);
    const previous = runs[runs.length - 1];
    if (!complex && previous && !previous.complex) {
      previous.features.push(feature);
    } else {
      runs.push({ complex, features: [feature] });
    }
  }
  return runs;
}

/**
 * Complex features go through the chunked builder as standalone chunks,
 * the rest through simple passes. Each segment has its own id allocators;
 * the namespace is shared.
 */
export class HybridStrategy implements GenerationStrategy {
  readonly name = "hybrid" as const;

  generate(doc: ParsedDocumentT, options: GenerateOptions = {}): GenerationResult {
    const settings = resolveSettings(options.settings);
    const namespace = options.namespace ?? new NamespaceAccumulator();

    const planned = planRuns(doc.features, settings.featureComplexityThreshold);
    const runs: FeatureRun[] = planned.length > 0 ? planned : [{ complex: false, features: [] }];

    const segments: SegmentGraph[] = runs.map((run, i) => {
      const ctx: AssemblyContext = { doc, namespace, nodeIds: new IdAllocator(), exitIds: new IdAllocator() };
      const first = i === 0;
      const last = i === runs.length - 1;
      const stubPrefix = `segment-${i + 1}`;
      if (run.complex) {
        return buildChunkSegments([run.features], ctx, { first, last, stubPrefix })[0];
      }
      return buildSimpleSegment(run.features, ctx, {
        startId: first ? "start" : `${stubPrefix}-start`,
        endId: last ? "end" : `${stubPrefix}-end`,
        final: last,
      });
    });

    const merged = dedupeSegments(segments);
    const exitIds = new IdAllocator(merged.flatMap((segment) => segment.exits.map((exit) => exit.id)));
    const graph = finishGraph(stitchSegments(merged, exitIds), doc, namespace);

    log.debug(
      { strategy: this.name, segments: runs.length, complex: runs.filter((r) => r.complex).length },
      "hybrid generation finished"
    );
    return {
      strategy: this.name,
      graph,
      warnings: [...namespace.warnings],
      stats: {
        features: doc.features.length,
        nodes: Object.keys(graph.flow.nodes).length,
        exits: graph.flow.exits.length,
        chunks: runs.length,
      },
    };
  }
}
