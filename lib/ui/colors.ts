// lib/ui/colors.ts
// Stable per-label colours for the grid view.

export const LABEL_CHARS = 4;

/** 32-bit FNV-1a of the label; same label, same colour, across runs. */
export function labelHash(label: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < label.length; i++) {
    h ^= label.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h >>> 0;
}

export function colorForLabel(label: string): string {
  const hue = labelHash(label) % 360;
  return `hsl(${hue}, 70%, 80%)`;
}

export function shortLabel(label: string, max = LABEL_CHARS): string {
  return label.length > max ? label.slice(0, max) : label;
}
