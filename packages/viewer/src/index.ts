// Snapshot → Three.js
export { snapshotToView, disposeView, isError } from './mesh-bridge.js';
export type { MeshView, MeshViewError, MeshViewOptions, MeshViewResult } from './mesh-bridge.js';

// Session binding
export { attachViewer } from './session-view.js';
export type { ViewSink, ViewUpdate } from './session-view.js';

export { paletteFor } from './palette.js';
export type { Palette, ThemeMode } from './palette.js';
