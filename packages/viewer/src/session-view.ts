/**
 * Keeps a host's view in step with a session: every published evaluation
 * result is turned into a ViewUpdate. The previous mesh view is disposed
 * when a new one replaces it.
 */

import type { EngineSession, NodeId } from '@meshgraph/graph-engine';
import { type MeshView, type MeshViewOptions, disposeView, isError, snapshotToView } from './mesh-bridge.js';

export type ViewUpdate =
  | { kind: 'mesh'; view: MeshView; requestId: number }
  | { kind: 'empty'; requestId: number; reason: string }
  | { kind: 'error'; requestId: number; nodeId: NodeId; message: string };

export type ViewSink = (update: ViewUpdate) => void;

/** Subscribe `sink` to `session`. Returns the detach function. */
export function attachViewer(session: EngineSession, sink: ViewSink, options: MeshViewOptions = {}): () => void {
  let current: MeshView | null = null;
  const replace = (next: MeshView | null): void => {
    if (current) disposeView(current);
    current = next;
  };

  const unsubscribe = session.subscribe((result) => {
    switch (result.status) {
      case 'ok': {
        if (!result.mesh) {
          replace(null);
          sink({ kind: 'empty', requestId: result.requestId, reason: `node ${result.target} has no mesh output` });
          return;
        }
        const view = snapshotToView(result.mesh, options);
        if (isError(view)) {
          replace(null);
          sink({ kind: 'empty', requestId: result.requestId, reason: view.error });
          return;
        }
        replace(view);
        sink({ kind: 'mesh', view, requestId: result.requestId });
        return;
      }
      case 'failed':
        sink({
          kind: 'error',
          requestId: result.requestId,
          nodeId: result.failure.nodeId,
          message: result.failure.error.message,
        });
        return;
      case 'no-target':
        replace(null);
        sink({ kind: 'empty', requestId: result.requestId, reason: 'no output node' });
        return;
      case 'superseded':
        return;
    }
  });

  return () => {
    unsubscribe();
    replace(null);
  };
}
