// src/ui/panels/StatusPanels.ts

import { CommonPanel, type Panel, type PanelContext } from './Panel';

/**
 * Shared layout of the idle and printing screens: a heading and the latest
 * connection label, refreshed every time the panel is shown.
 */
abstract class StatusPanel extends CommonPanel {
    private readonly stateLabel: HTMLElement;

    constructor(protected readonly ctx: PanelContext, heading: string, parent: Panel | null) {
        super(ctx.doc, parent);
        this.addLabel('panel-heading', heading);
        this.stateLabel = this.addLabel('panel-state', '');
    }

    show(): void {
        this.stateLabel.textContent = this.ctx.state.connectionState?.label ?? '';
        super.show();
    }
}

export class IdlePanel extends StatusPanel {
    readonly kind = 'idle' as const;

    constructor(ctx: PanelContext) {
        super(ctx, 'Printer is ready', null);
        this.root.classList.add('panel-idle');
        this.addButton('panel-btn system-btn', 'System', () => {
            this.ctx.navigator.showPanel(new SystemPanel(this.ctx, this));
        });
    }
}

export class PrintingPanel extends StatusPanel {
    readonly kind = 'printing' as const;

    constructor(ctx: PanelContext) {
        super(ctx, 'Printing', null);
        this.root.classList.add('panel-printing');
    }
}

/**
 * SystemPanel
 *
 * Read-only connection details, reached from the idle panel.  Back returns
 * to the exact panel instance that opened it.
 */
export class SystemPanel extends CommonPanel {
    readonly kind = 'system' as const;
    private readonly details: HTMLElement;

    constructor(private readonly ctx: PanelContext, parent: Panel) {
        super(ctx.doc, parent);
        this.root.classList.add('panel-system');
        this.addLabel('panel-heading', 'System');
        this.details = this.addLabel('system-details', '');
        this.addButton('panel-btn back-btn', 'Back', () => this.ctx.navigator.goBack());
    }

    show(): void {
        const { config, state } = this.ctx;
        this.details.textContent = [
            `Endpoint: ${config.endpoint}`,
            `API key: ${config.apiKey !== '' ? 'set' : 'not set'}`,
            `Display: ${config.width}x${config.height}`,
            `State: ${state.connectionState?.label ?? 'unknown'}`,
        ].join('\n');
        super.show();
    }
}
