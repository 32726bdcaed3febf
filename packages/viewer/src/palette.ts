/**
 * Viewer colors. The dark palette is the default; hosts with a light
 * background pass `mode: 'light'`.
 */

export type ThemeMode = 'dark' | 'light';

export interface Palette {
  geometry: number;
  edges: number;
  wireframe: number;
  lineOpacity: number;
}

const DARK: Palette = {
  geometry: 0xc9a84c,
  edges: 0x4a9e8e,
  wireframe: 0x4a9e8e,
  lineOpacity: 0.5,
};

const LIGHT: Palette = {
  geometry: 0xb8942e,
  edges: 0x2a7a6a,
  wireframe: 0x999999,
  lineOpacity: 0.6,
};

export function paletteFor(mode: ThemeMode): Palette {
  return mode === 'dark' ? { ...DARK } : { ...LIGHT };
}
