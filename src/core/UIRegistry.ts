// src/core/UIRegistry.ts

/**
 * UIRegistry
 *
 * The few fixed DOM elements the application mounts into, looked up once
 * at startup.  A missing element is a broken index.html and fails loudly.
 */
export interface UIRegistry {
    // Fixed-size application window
    window: HTMLElement;

    // Single slot the current panel is attached to
    panelSlot: HTMLElement;
}

function requireElement(doc: Document, id: string): HTMLElement {
    const el = doc.getElementById(id);
    if (!el) {
        throw new Error(`Missing #${id} element in the page`);
    }
    return el;
}

export function createUIRegistry(doc: Document = document): UIRegistry {
    return {
        window:    requireElement(doc, 'app'),
        panelSlot: requireElement(doc, 'panel-slot'),
    };
}
