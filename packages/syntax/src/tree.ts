/**
 * Value-semantics helpers for syntax trees. Nothing here mutates a node:
 * updates rebuild the spine from the root to the changed node and share
 * every untouched subtree.
 */
import type { SyntaxNode } from "@redup/shared-types";

/** Child indexes from the root to a node */
export type TreePath = readonly number[];

export interface PathedNode {
  node: SyntaxNode;
  path: TreePath;
  depth: number;
}

export function makeNode(
  label: string,
  children: readonly SyntaxNode[] = [],
  features: readonly string[] = []
): SyntaxNode {
  return { label, children: [...children], features: [...features] };
}

export function isTerminal(node: SyntaxNode): boolean {
  return node.children.length === 0;
}

/** Pre-order walk (mother before daughters, left before right) */
export function preorder(tree: SyntaxNode): PathedNode[] {
  const out: PathedNode[] = [];
  const visit = (node: SyntaxNode, path: number[]) => {
    out.push({ node, path, depth: path.length });
    node.children.forEach((child, i) => visit(child, [...path, i]));
  };
  visit(tree, []);
  return out;
}

/** Terminals in linear (left-to-right) order */
export function terminals(tree: SyntaxNode): PathedNode[] {
  return preorder(tree).filter(p => isTerminal(p.node));
}

/** Concatenated exponents of the terminals; unassigned terminals count as "" */
export function spelledOut(tree: SyntaxNode): string {
  return terminals(tree).map(t => t.node.phonology ?? "").join("");
}

export function nodeAt(tree: SyntaxNode, path: TreePath): SyntaxNode | undefined {
  let cur: SyntaxNode | undefined = tree;
  for (const i of path) cur = cur?.children[i];
  return cur;
}

/** Rebuild the tree with the node at `path` replaced by `update(node)` */
export function replaceAt(
  tree: SyntaxNode,
  path: TreePath,
  update: (node: SyntaxNode) => SyntaxNode
): SyntaxNode {
  const [head, ...rest] = path;
  if (head === undefined) return update(tree);
  const child = tree.children[head];
  if (!child) throw new RangeError(`No child ${head} under "${tree.label}".`);
  const children = tree.children.map((c, i) => (i === head ? replaceAt(c, rest, update) : c));
  return { ...tree, children };
}

export function withPhonology(node: SyntaxNode, phonology: string): SyntaxNode {
  return { ...node, phonology };
}

/** Deep-freeze a tree so a captured snapshot can never change */
export function freezeTree(tree: SyntaxNode): SyntaxNode {
  for (const child of tree.children) freezeTree(child);
  Object.freeze(tree.children);
  Object.freeze(tree.features);
  return Object.freeze(tree);
}

export function treeDepth(tree: SyntaxNode): number {
  return Math.max(0, ...preorder(tree).map(p => p.depth));
}
