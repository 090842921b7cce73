// src/features/connection/classify.ts

import type { ConnectionState } from '../../services/ConnectionState';

/**
 * What a successful status sample asks the reconciler to do.
 *   idle / printing – show that panel
 *   reconnect       – printer is in error or offline; ask the server to connect
 *   connecting      – stay on splash and show the raw state label
 *   unknown         – stay on splash, leave the message alone
 */
export type Classification = 'idle' | 'printing' | 'reconnect' | 'connecting' | 'unknown';

// Order matters: a state that is both operational and printing is idle
export function classifyConnectionState(state: ConnectionState): Classification {
    if (state.isOperational())                  return 'idle';
    if (state.isPrinting())                     return 'printing';
    if (state.isError() || state.isOffline())   return 'reconnect';
    if (state.isConnecting())                   return 'connecting';
    return 'unknown';
}
