import { list, text, type Decoder } from "./xml.js";

export interface HierarchyNode {
  name: string;
  children: HierarchyNode[];
}

/** `<dg name="...">` elements, nested to any depth */
export const hierarchyNode: Decoder<HierarchyNode> = (node) => ({
  name: text("@name")(node),
  children: list("dg", hierarchyNode)(node),
});

/**
 * Flatten a hierarchy into `child -> parent`, top-level nodes mapping to "".
 *
 * Pre-order, in list order, depth first. A name seen twice keeps the parent
 * from its last visit.
 */
export function flattenHierarchy(nodes: readonly HierarchyNode[] | undefined): Record<string, string> {
  const parents = new Map<string, string>();

  const visit = (node: HierarchyNode) => {
    for (const child of node.children) {
      parents.set(child.name, node.name);
      visit(child);
    }
  };

  for (const root of nodes ?? []) {
    parents.set(root.name, "");
    visit(root);
  }

  return Object.fromEntries(parents);
}
