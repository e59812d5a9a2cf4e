import type { NodeVariant, VisualHint } from '@repo-infographic/server/infographic';

/** Only http(s) links are rendered as anchors; anything else shows as text. */
export function safeExternalHref(href: string | undefined): string | null {
  const trimmed = href?.trim();
  if (!trimmed) return null;
  try {
    const url = new URL(trimmed);
    return url.protocol === 'https:' || url.protocol === 'http:' ? url.toString() : null;
  } catch {
    return null;
  }
}

const VARIANT_COLORS: Record<NodeVariant, string> = {
  repo: '#58A6FF',
  phase: '#A371F7',
  step: '#FF6B4A',
  file: '#D29922',
  function: '#FBBF24',
  code_block: '#4ADE80',
  unknown: '#8B949E',
};

/** A node's own hint color when it is a `#RRGGBB` value, else the variant's. */
export function accentColor(variant: NodeVariant, hint?: VisualHint): string {
  const own = hint?.colorHex?.trim();
  if (own && /^#[0-9a-f]{6}$/iu.test(own)) return own;
  return VARIANT_COLORS[variant];
}

export function nodeElementId(nodeId: string): string {
  return `node-${encodeURIComponent(nodeId)}`;
}
