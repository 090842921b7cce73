// src/features/connection/ConnectionReconciler.ts

import type { AppState, UIMode }        from '../../core/AppState';
import type { PrinterStatusSource }     from '../../services/OctoPrintClient';
import type { ConnectionState }         from '../../services/ConnectionState';
import { type LivenessSink, signalLiveness } from '../../services/LivenessNotifier';
import type { PanelNavigator }          from '../navigation/PanelNavigator';
import type { Panel }                   from '../../ui/panels/Panel';
import { classifyConnectionState }      from './classify';
import { formatUserError }              from './errorFormat';
import { createLogger }                 from '../../utils/log';
import { describeError }                from '../../utils/errors';

const log = createLogger('Reconciler');

/** Query failures stay off the splash screen for this long after startup. */
export const ERROR_MERCY_PERIOD_MS = 30_000;

/** Splash panel as the reconciler sees it: a panel with a message line. */
export interface SplashScreen extends Panel {
    setMessage(text: string): void;
}

/** Builds a fresh panel for each entry into idle or printing. */
export interface ModePanelFactory {
    idle(): Panel;
    printing(): Panel;
}

export interface ReconcilerOptions {
    /** Clock in ms; defaults to Date.now. */
    now?: () => number;
}

/**
 * ConnectionReconciler
 *
 * Runs once per poll.  Sends the liveness heartbeat, samples the printer
 * connection, maps it onto a UIMode and swaps the top-level panel only when
 * that mode changes.  Every failure is handled inside the tick.
 */
export class ConnectionReconciler {
    private readonly now: () => number;
    private readonly startedAt: number;

    constructor(
        private readonly state:     AppState,
        private readonly printer:   PrinterStatusSource,
        private readonly navigator: PanelNavigator,
        private readonly splash:    SplashScreen,
        private readonly panels:    ModePanelFactory,
        private readonly liveness:  LivenessSink,
        options: ReconcilerOptions = {},
    ) {
        this.now = options.now ?? Date.now;
        this.startedAt = this.now();
    }

    async verifyConnection(): Promise<void> {
        signalLiveness(this.liveness, 'WATCHDOG=1');

        const mode = await this.resolveMode();
        if (mode === this.state.uiMode) return;

        this.install(mode);
        this.state.uiMode = mode;
    }

    // ---------------------------------------------------------------
    // Private
    // ---------------------------------------------------------------

    private async resolveMode(): Promise<UIMode> {
        let current: ConnectionState;
        try {
            current = await this.printer.getConnectionState();
        } catch (err) {
            if (this.now() - this.startedAt >= ERROR_MERCY_PERIOD_MS) {
                this.splash.setMessage(this.userError(err));
            }
            log.debug(`Unexpected error: ${describeError(err)}`);
            return 'splash';
        }

        this.state.connectionState = current;

        switch (classifyConnectionState(current)) {
            case 'idle':
                return 'idle';
            case 'printing':
                return 'printing';
            case 'reconnect':
                // A successful connect is picked up by the next tick
                try {
                    await this.printer.connect();
                } catch (err) {
                    this.splash.setMessage(this.userError(err));
                }
                return 'splash';
            case 'connecting':
                this.splash.setMessage(current.label);
                return 'splash';
            default:
                return 'splash';
        }
    }

    private install(mode: UIMode): void {
        switch (mode) {
            case 'idle':
                log.info('Printer is ready');
                this.navigator.showPanel(this.panels.idle());
                break;
            case 'printing':
                log.info('Printing a job');
                this.navigator.showPanel(this.panels.printing());
                break;
            case 'splash':
                log.info('Waiting for printer connection');
                this.navigator.showPanel(this.splash);
                break;
        }
    }

    private userError(err: unknown): string {
        return formatUserError(err, this.printer.endpoint, this.printer.apiKey);
    }
}
