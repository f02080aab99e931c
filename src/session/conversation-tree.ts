import type { Message } from '../transcript/types.js';

export interface ConversationNode {
  uuid: string;
  parentUuid: string | null;
  isSidechain: boolean;
  depth: number;
  children: string[];
}

export interface ConversationStats {
  totalNodes: number;
  rootCount: number;
  leafCount: number;
  maxDepth: number;
  /** Nodes with more than one child. */
  numBranches: number;
  sidechainCount: number;
  /** Messages whose parentUuid is not present in the session. */
  orphanCount: number;
}

export interface ConversationTree {
  /** parentUuid → child uuids, in file order. */
  children: ReadonlyMap<string, readonly string[]>;
  roots: readonly string[];
  nodes: ReadonlyMap<string, ConversationNode>;
  stats: ConversationStats;
}

/**
 * Build the parent → children structure of a session. Sidechain edges are
 * kept. A message whose parent is missing from the session is treated as a
 * root and counted as an orphan.
 */
export function buildConversationTree(messages: readonly Message[]): ConversationTree {
  const known = new Set(messages.map((m) => m.uuid));
  const children = new Map<string, string[]>();
  const roots: string[] = [];
  let orphanCount = 0;

  for (const msg of messages) {
    if (msg.parentUuid === null) {
      roots.push(msg.uuid);
      continue;
    }
    if (!known.has(msg.parentUuid)) {
      orphanCount++;
      roots.push(msg.uuid);
    }
    const siblings = children.get(msg.parentUuid);
    if (siblings) {
      siblings.push(msg.uuid);
    } else {
      children.set(msg.parentUuid, [msg.uuid]);
    }
  }

  const nodes = new Map<string, ConversationNode>();
  const byUuid = new Map(messages.map((m) => [m.uuid, m]));

  // Iterative DFS; transcripts can be thousands of messages deep.
  const stack: Array<{ uuid: string; depth: number }> = roots
    .slice()
    .reverse()
    .map((uuid) => ({ uuid, depth: 0 }));

  while (stack.length > 0) {
    const item = stack.pop();
    if (!item || nodes.has(item.uuid)) continue;
    const msg = byUuid.get(item.uuid);
    if (!msg) continue;

    const kids = children.get(item.uuid) ?? [];
    nodes.set(item.uuid, {
      uuid: item.uuid,
      parentUuid: msg.parentUuid,
      isSidechain: msg.isSidechain,
      depth: item.depth,
      children: kids,
    });
    for (let i = kids.length - 1; i >= 0; i--) {
      stack.push({ uuid: kids[i], depth: item.depth + 1 });
    }
  }

  let maxDepth = 0;
  let leafCount = 0;
  let numBranches = 0;
  let sidechainCount = 0;
  for (const node of nodes.values()) {
    maxDepth = Math.max(maxDepth, node.depth);
    if (node.children.length === 0) leafCount++;
    if (node.children.length > 1) numBranches++;
    if (node.isSidechain) sidechainCount++;
  }

  return {
    children,
    roots,
    nodes,
    stats: {
      totalNodes: nodes.size,
      rootCount: roots.length,
      leafCount,
      maxDepth,
      numBranches,
      sidechainCount,
      orphanCount,
    },
  };
}
