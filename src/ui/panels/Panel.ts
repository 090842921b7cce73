// src/ui/panels/Panel.ts

import type { AppState }       from '../../core/AppState';
import type { AppConfig }      from '../../core/config';
import type { PanelNavigator } from '../../features/navigation/PanelNavigator';

export type PanelKind = 'splash' | 'idle' | 'printing' | 'system';

/**
 * Panel
 *
 * One full-screen view.  The navigator only relies on this contract and
 * never on the concrete panel classes.
 */
export interface Panel {
    readonly kind: PanelKind;
    show(): void;
    hide(): void;
    rootNode(): HTMLElement;
    /** Panel to return to with "back", or null at the top of the stack. */
    parent(): Panel | null;
}

/** Everything a panel may reach: the shared state, navigation and config. */
export interface PanelContext {
    doc:       Document;
    state:     AppState;
    navigator: PanelNavigator;
    config:    AppConfig;
}

/**
 * CommonPanel
 *
 * Base class for the DOM panels: builds the root grid element and toggles
 * its `hidden` class on show/hide.  The parent link is fixed at construction
 * by whichever panel creates the child.
 */
export abstract class CommonPanel implements Panel {
    abstract readonly kind: PanelKind;
    protected readonly root: HTMLElement;

    constructor(
        protected readonly doc: Document,
        private readonly parentPanel: Panel | null = null,
    ) {
        this.root = doc.createElement('div');
        this.root.classList.add('panel', 'hidden');
    }

    show(): void {
        this.root.classList.remove('hidden');
    }

    hide(): void {
        this.root.classList.add('hidden');
    }

    rootNode(): HTMLElement {
        return this.root;
    }

    parent(): Panel | null {
        return this.parentPanel;
    }

    protected addLabel(className: string, text: string): HTMLElement {
        const el = this.doc.createElement('div');
        el.className = className;
        el.textContent = text;
        this.root.appendChild(el);
        return el;
    }

    protected addButton(className: string, text: string, onClick: () => void): HTMLButtonElement {
        const btn = this.doc.createElement('button');
        btn.className = className;
        btn.textContent = text;
        btn.addEventListener('click', onClick);
        this.root.appendChild(btn);
        return btn;
    }
}
