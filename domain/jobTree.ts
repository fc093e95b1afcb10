/**
 * Job forest from the flat job-code map.
 * Roots: parentId absent or 0. Siblings sorted by name, case-insensitive.
 */

import type { JobCode } from "./timesheet.js";

export interface JobNode {
  readonly id: number;
  readonly name: string;
  readonly children: readonly JobNode[];
}

const ROOT = 0;

export function buildJobTree(jobCodes: Iterable<JobCode>): JobNode[] {
  const childrenOf = new Map<number, JobCode[]>();
  for (const jc of jobCodes) {
    const parentKey = jc.parentId ?? ROOT;
    const siblings = childrenOf.get(parentKey);
    if (siblings) siblings.push(jc);
    else childrenOf.set(parentKey, [jc]);
  }

  function makeChildren(parentId: number, path: ReadonlySet<number>): JobNode[] {
    const kids = [...(childrenOf.get(parentId) ?? [])].sort((a, b) =>
      a.name.toLowerCase().localeCompare(b.name.toLowerCase())
    );
    return kids
      .filter((jc) => !path.has(jc.id))
      .map((jc) => ({
        id: jc.id,
        name: jc.name,
        children: makeChildren(jc.id, new Set([...path, jc.id])),
      }));
  }

  return makeChildren(ROOT, new Set([ROOT]));
}

/** Depth-first lookup. */
export function findJobNode(tree: readonly JobNode[], id: number): JobNode | null {
  for (const node of tree) {
    if (node.id === id) return node;
    const hit = findJobNode(node.children, id);
    if (hit) return hit;
  }
  return null;
}
