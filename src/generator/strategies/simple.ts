import type { FeatureT, ParsedDocumentT } from "../../schemas/document.js";
import { log } from "../../utils/telemetry.js";
import {
  finishGraph,
  GraphBuilder,
  stitchSegments,
  type AssemblyContext,
  type SegmentGraph,
  type SegmentOptions,
} from "../graph-assembler.js";
import { IdAllocator } from "../id-allocator.js";
import { NamespaceAccumulator } from "../namespace.js";
import type { GenerateOptions, GenerationResult, GenerationStrategy } from "./types.js";

/** One pass over the given features, chained in document order */
export function buildSimpleSegment(
  features: readonly FeatureT[],
  ctx: AssemblyContext,
  options: SegmentOptions
): SegmentGraph {
  return new GraphBuilder(ctx).buildSegment(features, options);
}

export class SimpleStrategy implements GenerationStrategy {
  readonly name = "simple" as const;

  generate(doc: ParsedDocumentT, options: GenerateOptions = {}): GenerationResult {
    const namespace = options.namespace ?? new NamespaceAccumulator();
    const ctx: AssemblyContext = { doc, namespace, nodeIds: new IdAllocator(), exitIds: new IdAllocator() };

    const segment = buildSimpleSegment(doc.features, ctx, { startId: "start", endId: "end", final: true });
    const graph = finishGraph(stitchSegments([segment], ctx.exitIds), doc, namespace);

    log.debug({ strategy: this.name, nodes: Object.keys(graph.flow.nodes).length }, "simple generation finished");
    return {
      strategy: this.name,
      graph,
      warnings: [...namespace.warnings],
      stats: {
        features: doc.features.length,
        nodes: Object.keys(graph.flow.nodes).length,
        exits: graph.flow.exits.length,
        chunks: 1,
      },
    };
  }
}
