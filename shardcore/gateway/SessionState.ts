//shardcore/gateway/SessionState.ts

export interface SessionSnapshot {
  readonly sessionId: string | null;
  readonly sequence: number | null;
  readonly resumeUrl: string | null;
}

/**
 * Resume bookkeeping for one shard. The sequence only ever moves forward
 * within a session; `clear()` starts over.
 */
export class SessionState {
  private id: string | null = null;
  private seq: number | null = null;
  private resume: string | null = null;

  get sessionId(): string | null {
    return this.id;
  }

  get sequence(): number | null {
    return this.seq;
  }

  get resumeUrl(): string | null {
    return this.resume;
  }

  get canResume(): boolean {
    return this.id !== null && this.seq !== null;
  }

  begin(sessionId: string, resumeUrl: string | null): void {
    this.id = sessionId;
    this.resume = resumeUrl;
  }

  /** Record a dispatch sequence. Returns false (and keeps the old value) if it went backwards. */
  acceptSequence(sequence: number): boolean {
    if (this.seq !== null && sequence < this.seq) return false;
    this.seq = sequence;
    return true;
  }

  clear(): void {
    this.id = null;
    this.seq = null;
    this.resume = null;
  }

  snapshot(): SessionSnapshot {
    return Object.freeze({ sessionId: this.id, sequence: this.seq, resumeUrl: this.resume });
  }
}
