// src/ui/panels/SplashPanel.ts

import { CommonPanel } from './Panel';

export const SPLASH_INITIAL_MESSAGE = 'Initializing printer...';

/**
 * Shown while there is no usable printer connection.  Built once at boot
 * and reused for every return to splash; the reconciler writes connection
 * progress and errors into its message line.
 */
export class SplashPanel extends CommonPanel {
    readonly kind = 'splash' as const;
    private readonly label: HTMLElement;

    constructor(doc: Document) {
        super(doc, null);
        this.root.classList.add('panel-splash');
        this.addLabel('splash-logo', 'OctoPrint');
        this.label = this.addLabel('splash-message', SPLASH_INITIAL_MESSAGE);
    }

    get message(): string {
        return this.label.textContent ?? '';
    }

    setMessage(text: string): void {
        this.label.textContent = text;
    }
}
