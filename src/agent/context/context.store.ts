import {
  ContextStoreOptions,
  ConversationTurn,
  SearchContext,
  SearchSource,
  TurnCommit,
  VisionContext,
} from './context.types';

/**
 * Per-session memory: a FIFO conversation history, the last camera
 * description and the last search result. Capacity and staleness are fixed
 * at construction. The dispatcher is the only writer.
 */
export class ContextStore {
  private history: ConversationTurn[] = [];
  private vision?: VisionContext;
  private search?: SearchContext;
  private committedTurns = 0;

  constructor(private readonly options: ContextStoreOptions) {
    if (!Number.isInteger(options.historyCapacity) || options.historyCapacity < 1) {
      throw new RangeError('historyCapacity must be a positive integer');
    }
    if (
      !Number.isInteger(options.visionStaleAfterTurns) ||
      options.visionStaleAfterTurns < 1
    ) {
      throw new RangeError('visionStaleAfterTurns must be a positive integer');
    }
  }

  get capacity(): number {
    return this.options.historyCapacity;
  }

  /** Number of turns committed since the store was created. */
  get turnCount(): number {
    return this.committedTurns;
  }

  appendTurn(turn: ConversationTurn): void {
    this.history.push({ ...turn });
    if (this.history.length > this.options.historyCapacity) {
      this.history = this.history.slice(-this.options.historyCapacity);
    }
  }

  /** Up to `n` most recent turns, oldest first. */
  recentTurns(n: number): ConversationTurn[] {
    if (n <= 0) return [];
    return this.history.slice(-n).map((turn) => ({ ...turn }));
  }

  setVisionContext(
    description: string,
    capturedAt: string = new Date().toISOString(),
  ): void {
    this.vision = { description, capturedAt, turnIndex: this.committedTurns };
  }

  /** The stored description, or undefined when absent or stale. */
  getVisionContext(): VisionContext | undefined {
    if (!this.vision || this.isStale(this.vision)) return undefined;
    return { ...this.vision };
  }

  /** True when a description exists but too many turns have passed. */
  hasExpiredVisionContext(): boolean {
    return this.vision !== undefined && this.isStale(this.vision);
  }

  visionAge(): number | undefined {
    return this.vision ? this.committedTurns - this.vision.turnIndex : undefined;
  }

  setSearchContext(query: string, snippet: string, source: SearchSource): void {
    this.search = { query, snippet, source };
  }

  getSearchContext(): SearchContext | undefined {
    return this.search ? { ...this.search } : undefined;
  }

  reset(): void {
    this.history = [];
    this.vision = undefined;
    this.search = undefined;
  }

  /**
   * Applies one finished turn. Everything in the commit lands together and
   * the turn counter advances by one.
   */
  commit(commit: TurnCommit): void {
    if (commit.reset) this.reset();
    const liveVision =
      this.vision && !this.isStale(this.vision) ? this.vision : undefined;
    this.committedTurns++;

    for (const turn of commit.turns) this.appendTurn(turn);

    if (commit.vision) {
      this.setVisionContext(commit.vision.description, commit.vision.capturedAt);
    } else if (commit.touchVision && liveVision) {
      this.vision = { ...liveVision, turnIndex: this.committedTurns };
    }

    if (commit.search) {
      const { query, snippet, source } = commit.search;
      this.setSearchContext(query, snippet, source);
    }
  }

  private isStale(vision: VisionContext): boolean {
    return (
      this.committedTurns - vision.turnIndex >= this.options.visionStaleAfterTurns
    );
  }
}
