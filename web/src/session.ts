import {
  ExpansionState,
  GenerationError,
  renderDocumentBody,
  type DecodeIssue,
  type GenerateResult,
  type GenerationErrorKind,
  type InfographicDocument,
  type RenderedNode,
} from '@repo-infographic/server/infographic';

export type SessionError = {
  message: string;
  kind?: GenerationErrorKind;
};

export type PendingGeneration = {
  token: number;
  locator: string;
  stage: string;
};

export type SessionSnapshot = {
  document: InfographicDocument | null;
  issues: DecodeIssue[];
  /** Visible rows under the repository header. */
  body: RenderedNode[];
  expandedCount: number;
  error: SessionError | null;
  pending: PendingGeneration | null;
};

export type GenerateRunner = (
  locator: string,
  signal: AbortSignal,
  onStage: (stage: string) => void,
) => Promise<GenerateResult>;

export type CompletionOutcome = 'applied' | 'failed' | 'cancelled' | 'stale';

/**
 * Owns the loaded document, its expansion state and the single in-flight
 * generation. Every generation gets a token; only the latest token may
 * publish, so a late reply from a superseded request is dropped.
 */
export class InfographicSession {
  private document: InfographicDocument | null = null;
  private issues: DecodeIssue[] = [];
  private expansion = new ExpansionState();
  private error: SessionError | null = null;
  private latestToken = 0;
  private inFlight: (PendingGeneration & { controller: AbortController }) | null = null;
  private listeners = new Set<() => void>();
  private snapshot: SessionSnapshot;

  constructor(private readonly runner?: GenerateRunner) {
    this.snapshot = this.buildSnapshot();
  }

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = (): SessionSnapshot => this.snapshot;

  get currentDocument(): InfographicDocument | null {
    return this.document;
  }

  isExpanded(nodeId: string): boolean {
    return this.expansion.isExpanded(nodeId);
  }

  /** Replaces the document and starts from a fully collapsed tree. Supersedes a running generation. */
  load(document: InfographicDocument, issues: DecodeIssue[] = []): void {
    this.supersede();
    this.applyDocument(document, issues);
    this.emit();
  }

  /** Records a failure; the loaded document stays as it is. */
  fail(message: string, kind?: SessionError['kind']): void {
    this.error = { message, kind };
    this.emit();
  }

  dismissError(): void {
    if (!this.error) return;
    this.error = null;
    this.emit();
  }

  toggle(nodeId: string): boolean {
    const next = this.expansion.toggle(nodeId);
    this.emit();
    return next;
  }

  expandAll(): void {
    if (!this.document) return;
    this.expansion.expandAll(this.document.root);
    this.emit();
  }

  collapseAll(): void {
    this.expansion.collapseAll();
    this.emit();
  }

  reveal(nodeId: string): boolean {
    if (!this.document) return false;
    const found = this.expansion.reveal(this.document.root, nodeId);
    if (found) this.emit();
    return found;
  }

  beginGeneration(locator: string): { token: number; signal: AbortSignal } {
    this.inFlight?.controller.abort();
    this.latestToken += 1;
    const controller = new AbortController();
    this.inFlight = { token: this.latestToken, locator, stage: 'Starting', controller };
    this.error = null;
    this.emit();
    return { token: this.latestToken, signal: controller.signal };
  }

  reportStage(token: number, stage: string): void {
    if (!this.inFlight || this.inFlight.token !== token) return;
    this.inFlight = { ...this.inFlight, stage };
    this.emit();
  }

  completeGeneration(token: number, result: GenerateResult): CompletionOutcome {
    if (token !== this.latestToken || !this.inFlight || this.inFlight.token !== token) return 'stale';
    this.inFlight = null;

    if (result.ok) {
      this.applyDocument(result.document, result.issues);
      this.emit();
      return 'applied';
    }

    if (result.error.kind === 'Cancelled') {
      this.emit();
      return 'cancelled';
    }

    this.error = { message: result.error.message, kind: result.error.kind };
    this.emit();
    return 'failed';
  }

  /** false when nothing is running. */
  cancelGeneration(): boolean {
    if (!this.inFlight) return false;
    this.supersede();
    this.emit();
    return true;
  }

  async generate(locator: string): Promise<CompletionOutcome> {
    if (!this.runner) throw new Error('InfographicSession has no generation runner');
    const { token, signal } = this.beginGeneration(locator);

    let result: GenerateResult;
    try {
      result = await this.runner(locator, signal, (stage) => this.reportStage(token, stage));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result = { ok: false, error: new GenerationError('TransportFailure', message) };
    }
    return this.completeGeneration(token, result);
  }

  private supersede(): void {
    if (!this.inFlight) return;
    this.inFlight.controller.abort();
    this.inFlight = null;
    this.latestToken += 1;
  }

  private applyDocument(document: InfographicDocument, issues: DecodeIssue[]): void {
    this.document = document;
    this.issues = issues;
    this.expansion = new ExpansionState();
    this.error = null;
  }

  private buildSnapshot(): SessionSnapshot {
    const pending = this.inFlight
      ? { token: this.inFlight.token, locator: this.inFlight.locator, stage: this.inFlight.stage }
      : null;
    return {
      document: this.document,
      issues: this.issues,
      body: this.document ? renderDocumentBody(this.document, this.expansion) : [],
      expandedCount: this.expansion.size,
      error: this.error,
      pending,
    };
  }

  private emit(): void {
    this.snapshot = this.buildSnapshot();
    for (const listener of this.listeners) listener();
  }
}
