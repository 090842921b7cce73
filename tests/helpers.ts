// tests/helpers.ts
/**
 * In-process stand-ins for the reconciler's collaborators.  Panels and the
 * display surface write into one shared event log so tests can assert the
 * exact order of detach / hide / attach / show calls.
 */
import { ConnectionState }               from '../src/services/ConnectionState';
import type { PrinterStatusSource }      from '../src/services/OctoPrintClient';
import type { LivenessSink }             from '../src/services/LivenessNotifier';
import type { DisplaySurface }           from '../src/features/navigation/PanelNavigator';
import type { Panel, PanelKind }         from '../src/ui/panels/Panel';

export class FakePanel implements Panel {
    readonly node: HTMLElement;
    visible = false;

    constructor(
        readonly kind: PanelKind,
        readonly id: string,
        private readonly events: string[],
        private readonly parentPanel: Panel | null = null,
    ) {
        this.node = document.createElement('div');
        this.node.dataset.id = id;
    }

    show(): void   { this.visible = true;  this.events.push(`show:${this.id}`); }
    hide(): void   { this.visible = false; this.events.push(`hide:${this.id}`); }
    rootNode(): HTMLElement    { return this.node; }
    parent(): Panel | null     { return this.parentPanel; }
}

export class RecordingSurface implements DisplaySurface {
    readonly attached: HTMLElement[] = [];

    constructor(private readonly events: string[]) {}

    attach(node: HTMLElement): void {
        this.attached.push(node);
        this.events.push(`attach:${node.dataset.id ?? '?'}`);
    }

    detach(node: HTMLElement): void {
        const i = this.attached.indexOf(node);
        if (i >= 0) this.attached.splice(i, 1);
        this.events.push(`detach:${node.dataset.id ?? '?'}`);
    }
}

/** Answers every query with `next` (a state, or an error to reject with). */
export class FakePrinter implements PrinterStatusSource {
    next: ConnectionState | Error = new ConnectionState('Offline');
    connectError: Error | null = null;
    queries = 0;
    connects = 0;

    constructor(readonly endpoint = 'http://host:80', readonly apiKey = 'test-secret') {}

    setState(label: string): void {
        this.next = new ConnectionState(label);
    }

    async getConnectionState(): Promise<ConnectionState> {
        this.queries++;
        if (this.next instanceof Error) throw this.next;
        return this.next;
    }

    async connect(): Promise<void> {
        this.connects++;
        if (this.connectError) throw this.connectError;
    }
}

export class FakeLiveness implements LivenessSink {
    readonly messages: string[] = [];
    failWith: Error | null = null;

    async notify(message: string): Promise<void> {
        this.messages.push(message);
        if (this.failWith) throw this.failWith;
    }
}
