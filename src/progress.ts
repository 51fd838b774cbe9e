export type ProgressCallback = (count: number) => void;

/**
 * Counts processed items and reports them to the task runner as one JSON
 * line per report, which the platform turns into a progress bar.
 */
export class Progress {
  readonly message: string;
  readonly total: number;
  current = 0;

  /**
   * @param message label shown next to the progress bar
   * @param total number of items expected
   */
  constructor(message: string, total: number) {
    this.message = message;
    this.total = total;
  }

  /**
   * Marks `count` more items as done and reports the new position.
   */
  public itersDoneReport(count: number): void {
    this.current += count;
    console.info(
      JSON.stringify({
        event_type: 'progress',
        message: this.message,
        current: this.current,
        total: this.total
      })
    );
  }

  public isDone(): boolean {
    return this.current >= this.total;
  }

  /** Bound `itersDoneReport`, to pass where a progress callback is expected. */
  public get callback(): ProgressCallback {
    return (count: number) => this.itersDoneReport(count);
  }
}
