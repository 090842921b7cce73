// src/features/navigation/PanelNavigator.ts

import type { AppState } from '../../core/AppState';
import type { Panel }    from '../../ui/panels/Panel';
import { createLogger }  from '../../utils/log';

const log = createLogger('Navigator');

/** The single fixed slot panels are mounted into. */
export interface DisplaySurface {
    attach(node: HTMLElement): void;
    detach(node: HTMLElement): void;
}

/** DisplaySurface backed by one container element (the `#panel-slot`). */
export class DomDisplaySurface implements DisplaySurface {
    constructor(private readonly slot: HTMLElement) {}

    attach(node: HTMLElement): void {
        this.slot.appendChild(node);
    }

    detach(node: HTMLElement): void {
        if (node.parentNode === this.slot) {
            this.slot.removeChild(node);
        }
    }
}

/**
 * PanelNavigator
 *
 * Swaps the current panel in and out of the display slot.  The old panel
 * is always detached and hidden before the new one is attached and shown,
 * so the slot never holds two panels at once.
 */
export class PanelNavigator {
    constructor(
        private readonly state:   AppState,
        private readonly surface: DisplaySurface,
    ) {}

    get current(): Panel | null {
        return this.state.currentPanel;
    }

    showPanel(panel: Panel): void {
        const previous = this.state.currentPanel;
        if (previous) {
            this.surface.detach(previous.rootNode());
            previous.hide();
        }

        this.state.currentPanel = panel;
        this.surface.attach(panel.rootNode());
        panel.show();
    }

    /** Returns to the current panel's parent instance. */
    goBack(): void {
        const parent = this.state.currentPanel?.parent() ?? null;
        if (!parent) {
            log.warn('goBack() called on a panel without a parent');
            return;
        }
        this.showPanel(parent);
    }
}
