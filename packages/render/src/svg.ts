/**
 * SVG tree diagrams. Leaves are laid out left to right, each in a column
 * as wide as its caption; a mother sits centred over its first and last
 * daughters. Terminals show their exponent on a second line.
 */
import type { SyntaxNode } from "@redup/shared-types";
import { exponentText, nodeCaption } from "./text.js";

export interface SvgOptions {
  /** Heading drawn above the tree, e.g. the stage name */
  title?: string;
  levelHeight?: number;
  charWidth?: number;
  fontSize?: number;
}

interface Placed {
  node: SyntaxNode;
  x: number;
  y: number;
  children: Placed[];
}

const MARGIN = 20;
const COLUMN_PADDING = 24;
const TITLE_HEIGHT = 30;

export function renderSvg(tree: SyntaxNode, options: SvgOptions = {}): string {
  const levelHeight = options.levelHeight ?? 60;
  const charWidth = options.charWidth ?? 8;
  const fontSize = options.fontSize ?? 14;
  const top = MARGIN + (options.title ? TITLE_HEIGHT : 0);

  let cursor = MARGIN;
  let maxDepth = 0;
  const place = (node: SyntaxNode, depth: number): Placed => {
    maxDepth = Math.max(maxDepth, depth);
    const y = top + depth * levelHeight;
    if (node.children.length === 0) {
      const width = columnWidth(node, charWidth);
      const placed = { node, x: cursor + width / 2, y, children: [] };
      cursor += width;
      return placed;
    }
    const children = node.children.map(c => place(c, depth + 1));
    const first = children[0];
    const last = children[children.length - 1];
    const x = first && last ? (first.x + last.x) / 2 : cursor;
    return { node, x, y, children };
  };
  const root = place(tree, 0);

  const width = Math.max(cursor + MARGIN, options.title ? options.title.length * charWidth + 2 * MARGIN : 0);
  const height = top + maxDepth * levelHeight + fontSize * 2 + MARGIN;

  const edges: string[] = [];
  const labels: string[] = [];
  const draw = (p: Placed): void => {
    labels.push(`<text x="${fmt(p.x)}" y="${fmt(p.y)}" text-anchor="middle" class="label">${esc(nodeCaption(p.node))}</text>`);
    const exp = p.children.length === 0 ? exponentText(p.node) : null;
    if (exp !== null) {
      labels.push(`<text x="${fmt(p.x)}" y="${fmt(p.y + fontSize + 4)}" text-anchor="middle" class="exponent">${esc(exp)}</text>`);
    }
    for (const c of p.children) {
      edges.push(`<line x1="${fmt(p.x)}" y1="${fmt(p.y + 6)}" x2="${fmt(c.x)}" y2="${fmt(c.y - fontSize)}" stroke="#333" stroke-width="1"/>`);
      draw(c);
    }
  };
  draw(root);

  const title = options.title
    ? [`<text x="${MARGIN}" y="${MARGIN + fontSize}" class="title">${esc(options.title)}</text>`]
    : [];

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${fmt(width)}" height="${fmt(height)}" viewBox="0 0 ${fmt(width)} ${fmt(height)}">`,
    `<style>text{font-family:serif;font-size:${fontSize}px}.exponent{font-style:italic}.title{font-weight:bold}</style>`,
    `<rect width="100%" height="100%" fill="#fff"/>`,
    ...title,
    ...edges,
    ...labels,
    `</svg>`,
  ].join("\n") + "\n";
}

export function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

// ─── Internals ────────────────────────────────────────────────────────────────

function columnWidth(node: SyntaxNode, charWidth: number): number {
  const chars = Math.max(nodeCaption(node).length, exponentText(node)?.length ?? 0);
  return chars * charWidth + COLUMN_PADDING;
}

function fmt(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(1);
}
