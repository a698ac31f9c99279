export type StreamState =
  | 'pending'
  | 'streaming'
  | 'completed'
  | 'aborted'
  | 'timedOut';

export type TerminalStreamState = Extract<
  StreamState,
  'completed' | 'aborted' | 'timedOut'
>;

/**
 * One proxied download. State only moves forward:
 * pending -> streaming -> completed | aborted | timedOut.
 * Entering a terminal state clears the deadline, aborts the session signal
 * (unless completed) and runs `release` exactly once.
 */
export class StreamSession {
  private currentState: StreamState = 'pending';
  private readonly controller = new AbortController();
  private deadlineTimer: NodeJS.Timeout | undefined;
  private failure: Error | undefined;
  bytesTransferred = 0;

  constructor(
    readonly id: string,
    readonly deadlineMs: number,
    private readonly release: () => void,
    private readonly onDeadline: () => Error
  ) {}

  get state(): StreamState {
    return this.currentState;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get error(): Error | undefined {
    return this.failure;
  }

  get isTerminal(): boolean {
    return this.currentState !== 'pending' && this.currentState !== 'streaming';
  }

  begin(): void {
    if (this.currentState !== 'pending') return;
    this.currentState = 'streaming';
    this.deadlineTimer = setTimeout(() => {
      this.finish('timedOut', this.onDeadline());
    }, this.deadlineMs);
  }

  /** Returns false when the session had already finished. */
  finish(state: TerminalStreamState, reason?: Error): boolean {
    if (this.isTerminal) return false;

    this.currentState = state;
    this.failure = reason;
    if (this.deadlineTimer) {
      clearTimeout(this.deadlineTimer);
      this.deadlineTimer = undefined;
    }
    if (state !== 'completed') this.controller.abort(reason);
    this.release();
    return true;
  }
}
