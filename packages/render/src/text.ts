import type { SyntaxNode } from "@redup/shared-types";

/** Null exponents print as ∅; unassigned terminals print nothing */
export const NULL_EXPONENT = "∅";

/** `T[past.3sg]`, `RedP (VOWEL)` */
export function nodeCaption(node: SyntaxNode): string {
  const features = node.features.length > 0 ? `[${node.features.join(".")}]` : "";
  const env = node.environment ? ` (${node.environment})` : "";
  return `${node.label}${features}${env}`;
}

export function exponentText(node: SyntaxNode): string | null {
  if (node.phonology === undefined) return null;
  return node.phonology === "" ? NULL_EXPONENT : node.phonology;
}

/** Labelled bracketing: `[RedP [RED ba] [Root [T ba]]]` */
export function renderBracketed(tree: SyntaxNode): string {
  const caption = nodeCaption(tree);
  if (tree.children.length === 0) {
    const exp = exponentText(tree);
    return exp === null ? `[${caption}]` : `[${caption} ${exp}]`;
  }
  return `[${caption} ${tree.children.map(renderBracketed).join(" ")}]`;
}

/**
 * Box-drawing outline, one node per line:
 *
 *   TP
 *   ├── AspP
 *   │   ├── V = tobak
 *   │   └── Asp = ∅
 *   └── T = ∅
 */
export function renderAscii(tree: SyntaxNode): string {
  const lines: string[] = [];
  const walk = (node: SyntaxNode, prefix: string, branch: string): void => {
    const exp = exponentText(node);
    lines.push(`${prefix}${branch}${nodeCaption(node)}${exp === null ? "" : ` = ${exp}`}`);
    const childPrefix = prefix + (branch === "" ? "" : branch === "└── " ? "    " : "│   ");
    node.children.forEach((child, i) => {
      walk(child, childPrefix, i === node.children.length - 1 ? "└── " : "├── ");
    });
  };
  walk(tree, "", "");
  return lines.join("\n");
}
