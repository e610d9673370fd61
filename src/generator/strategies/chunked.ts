import type { FeatureT, ParsedDocumentT } from "../../schemas/document.js";
import { log } from "../../utils/telemetry.js";
import {
  finishGraph,
  GraphBuilder,
  stitchSegments,
  type AssemblyContext,
  type SegmentGraph,
} from "../graph-assembler.js";
import { IdAllocator } from "../id-allocator.js";
import { NamespaceAccumulator } from "../namespace.js";
import {
  resolveSettings,
  type GenerateOptions,
  type GenerationResult,
  type GenerationStrategy,
  type StrategySettings,
} from "./types.js";

/**
 * One chunk per feature, except runs of small features (at most
 * `smallFeatureMaxSteps` steps), which are batched up to `chunkSize`.
 */
export function planChunks(
  features: readonly FeatureT[],
  settings: Pick<StrategySettings, "chunkSize" | "smallFeatureMaxSteps">
): FeatureT[][] {
  const chunks: FeatureT[][] = [];
  let batch: FeatureT[] = [];
  const flush = (): void => {
    if (batch.length > 0) {
      chunks.push(batch);
      batch = [];
    }
  };

  for (const feature of features) {
    if (feature.steps.length <= settings.smallFeatureMaxSteps) {
      batch.push(feature);
      if (batch.length >= settings.chunkSize) flush();
    } else {
      flush();
      chunks.push([feature]);
    }
  }
  flush();
  return chunks;
}

export interface ChunkSegmentOptions {
  /** The first chunk opens the flow: its stub is the real start */
  first: boolean;
  /** The last chunk closes the flow: its stub is the shared end */
  last: boolean;
  stubPrefix: string;
}

export function buildChunkSegments(
  chunks: readonly FeatureT[][],
  ctx: AssemblyContext,
  options: ChunkSegmentOptions
): SegmentGraph[] {
  return chunks.map((chunk, i) => {
    const opens = options.first && i === 0;
    const closes = options.last && i === chunks.length - 1;
    return new GraphBuilder(ctx).buildSegment(chunk, {
      startId: opens ? "start" : `${options.stubPrefix}-${i + 1}-start`,
      endId: closes ? "end" : `${options.stubPrefix}-${i + 1}-end`,
      final: closes,
    });
  });
}

export class ChunkedStrategy implements GenerationStrategy {
  readonly name = "chunked" as const;

  generate(doc: ParsedDocumentT, options: GenerateOptions = {}): GenerationResult {
    const settings = resolveSettings(options.settings);
    const namespace = options.namespace ?? new NamespaceAccumulator();
    const ctx: AssemblyContext = { doc, namespace, nodeIds: new IdAllocator(), exitIds: new IdAllocator() };

    const planned = planChunks(doc.features, settings);
    const chunks: FeatureT[][] = planned.length > 0 ? planned : [[]];
    const segments = buildChunkSegments(chunks, ctx, { first: true, last: true, stubPrefix: "chunk" });
    const graph = finishGraph(stitchSegments(segments, ctx.exitIds), doc, namespace);

    log.debug({ strategy: this.name, chunks: chunks.length }, "chunked generation finished");
    return {
      strategy: this.name,
      graph,
      warnings: [...namespace.warnings],
      stats: {
        features: doc.features.length,
        nodes: Object.keys(graph.flow.nodes).length,
        exits: graph.flow.exits.length,
        chunks: chunks.length,
      },
    };
  }
}
