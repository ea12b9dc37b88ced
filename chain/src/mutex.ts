/** Runs async sections one at a time, in call order. */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  get locked(): boolean {
    return this.waiting > 0;
  }

  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    this.waiting++;
    const run = this.tail.then(fn).finally(() => {
      this.waiting--;
    });
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }
}
