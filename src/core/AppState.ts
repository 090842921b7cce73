// src/core/AppState.ts

import type { ConnectionState } from '../services/ConnectionState';
import type { Panel }           from '../ui/panels/Panel';

/** Coarse application state deciding which top-level panel is shown. */
export type UIMode = 'splash' | 'idle' | 'printing';

/**
 * AppState
 *
 * Single application context shared by reference between the reconciler,
 * the navigator and the panels.  No sub-system keeps its own copy of these
 * fields.
 */
export interface AppState {
    // Recorded mode of the reconciler; the splash panel is installed at boot
    uiMode: UIMode;

    // Panel whose root node currently sits in the display slot
    currentPanel: Panel | null;

    // Latest sample from the printer, overwritten on every successful poll
    connectionState: ConnectionState | null;
}

export function createAppState(): AppState {
    return {
        uiMode:          'splash',
        currentPanel:    null,
        connectionState: null,
    };
}
