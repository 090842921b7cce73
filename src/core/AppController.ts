// src/core/AppController.ts

import { type UIRegistry, createUIRegistry } from './UIRegistry';
import { type AppState, createAppState } from './AppState';
import { type AppConfig, scaleFactorFor } from './config';
import { OctoPrintClient, type PrinterStatusSource } from '../services/OctoPrintClient';
import { BackgroundTask }                 from '../services/BackgroundTask';
import {
    HttpLivenessSink,
    LogLivenessSink,
    signalLiveness,
    type LivenessSink,
} from '../services/LivenessNotifier';
import { ConnectionReconciler, type ReconcilerOptions } from '../features/connection/ConnectionReconciler';
import { DomDisplaySurface, PanelNavigator } from '../features/navigation/PanelNavigator';
import type { PanelContext }              from '../ui/panels/Panel';
import { SplashPanel }                    from '../ui/panels/SplashPanel';
import { IdlePanel, PrintingPanel }       from '../ui/panels/StatusPanels';
import { createLogger, setLogLevel }      from '../utils/log';

const log = createLogger('App');

export const STYLE_FILENAME = 'style.css';

/** Collaborators that can be swapped out, mainly by tests. */
export interface AppControllerDeps {
    doc?: Document;
    printer?: PrinterStatusSource;
    liveness?: LivenessSink;
    reconciler?: ReconcilerOptions;
}

/**
 * AppController  (orchestrator)
 *
 * Builds the shared state and every sub-system, sizes the window, loads the
 * theme and installs the splash panel.  `start()` begins polling and must
 * be called once, when the page is ready.
 */
export class AppController {
    readonly state: AppState;
    readonly ui: UIRegistry;
    readonly navigator: PanelNavigator;
    readonly splash: SplashPanel;
    readonly reconciler: ConnectionReconciler;

    private readonly doc: Document;
    private readonly poller: BackgroundTask;
    private readonly liveness: LivenessSink;

    constructor(private readonly config: AppConfig, deps: AppControllerDeps = {}) {
        setLogLevel(config.logLevel);

        this.doc   = deps.doc ?? document;
        this.ui    = createUIRegistry(this.doc);
        this.state = createAppState();

        const printer = deps.printer ?? new OctoPrintClient(config.endpoint, config.apiKey);
        this.liveness = deps.liveness ?? (config.watchdogUrl
            ? new HttpLivenessSink(config.watchdogUrl)
            : new LogLivenessSink());

        this.navigator = new PanelNavigator(this.state, new DomDisplaySurface(this.ui.panelSlot));

        const ctx: PanelContext = {
            doc:       this.doc,
            state:     this.state,
            navigator: this.navigator,
            config,
        };

        this.splash = new SplashPanel(this.doc);
        this.reconciler = new ConnectionReconciler(
            this.state,
            printer,
            this.navigator,
            this.splash,
            {
                idle:     () => new IdlePanel(ctx),
                printing: () => new PrintingPanel(ctx),
            },
            this.liveness,
            deps.reconciler,
        );

        this.poller = new BackgroundTask(config.pollIntervalMs, () => this.reconciler.verifyConnection());

        this.init();
    }

    start(): void {
        this.poller.start();
    }

    stop(): void {
        this.poller.stop();
    }

    // ===================================================================
    // Initialisation
    // ===================================================================

    private init(): void {
        this.loadStyle();
        this.setupWindow();
        this.navigator.showPanel(this.splash);
        signalLiveness(this.liveness, 'READY=1');
    }

    private setupWindow(): void {
        const { width, height } = this.config;
        this.ui.window.style.width  = `${width}px`;
        this.ui.window.style.height = `${height}px`;
        this.doc.documentElement.dataset.scale = String(scaleFactorFor(width));
        this.doc.title = 'Printer';
    }

    private loadStyle(): void {
        const href = this.config.stylePath
            ? `${this.config.stylePath}/${STYLE_FILENAME}`
            : STYLE_FILENAME;

        const link = this.doc.createElement('link');
        link.rel  = 'stylesheet';
        link.href = href;
        link.addEventListener('error', () => log.error(`Error loading style sheet ${href}`));
        this.doc.head.appendChild(link);
    }
}
