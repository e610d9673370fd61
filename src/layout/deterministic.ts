import type { FlowT, PositionT } from "../schemas/flow.js";

/**
 * Layout configuration
 */
export interface LayoutConfig {
  /** Left margin (default 100px) */
  originX?: number;
  /** Top margin (default 100px) */
  originY?: number;
  /** Horizontal spacing between depth layers (default 300px) */
  horizontalSpacing?: number;
  /** Vertical spacing between nodes of one layer (default 200px) */
  verticalSpacing?: number;
}

const DEFAULT_CONFIG: Required<LayoutConfig> = {
  originX: 100,
  originY: 100,
  horizontalSpacing: 300,
  verticalSpacing: 200,
};

/**
 * Breadth-first depth of every node from the start node, following exits in
 * flow order. Nodes the walk never reaches are placed one layer past the
 * deepest reachable node.
 */
export function assignDepths(flow: FlowT): Map<string, number> {
  const depths = new Map<string, number>();
  const children = new Map<string, string[]>();
  for (const exit of flow.exits) {
    const list = children.get(exit.source_node_id) ?? [];
    list.push(exit.target_node_id);
    children.set(exit.source_node_id, list);
  }

  const queue: string[] = [];
  if (flow.start_node_id in flow.nodes) {
    depths.set(flow.start_node_id, 0);
    queue.push(flow.start_node_id);
  }

  let head = 0;
  while (head < queue.length) {
    const nodeId = queue[head];
    head += 1;
    const depth = depths.get(nodeId) ?? 0;
    for (const child of children.get(nodeId) ?? []) {
      if (!depths.has(child) && child in flow.nodes) {
        depths.set(child, depth + 1);
        queue.push(child);
      }
    }
  }

  const orphanDepth = depths.size > 0 ? Math.max(...depths.values()) + 1 : 0;
  for (const nodeId of Object.keys(flow.nodes)) {
    if (!depths.has(nodeId)) depths.set(nodeId, orphanDepth);
  }
  return depths;
}

/**
 * Deterministic positions: `x` by depth, `y` by order of discovery inside
 * the layer.
 */
export function computeLayout(flow: FlowT, config: LayoutConfig = {}): Map<string, PositionT> {
  const cfg = { ...DEFAULT_CONFIG, ...config };
  const depths = assignDepths(flow);

  const ordered = [...depths.entries()];
  const rows = new Map<number, number>();
  const positions = new Map<string, PositionT>();
  for (const [nodeId, depth] of ordered) {
    const row = rows.get(depth) ?? 0;
    rows.set(depth, row + 1);
    positions.set(nodeId, {
      x: cfg.originX + cfg.horizontalSpacing * depth,
      y: cfg.originY + cfg.verticalSpacing * row,
    });
  }
  return positions;
}

/** Writes the computed positions into the flow's nodes */
export function applyLayout(flow: FlowT, config: LayoutConfig = {}): void {
  for (const [nodeId, position] of computeLayout(flow, config)) {
    const node = flow.nodes[nodeId];
    if (node) node.position = position;
  }
}
