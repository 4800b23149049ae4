/** Anything holding listeners or other resources that must be released explicitly. */
export interface Disposable {
  dispose(): void;
}

/** Wrap a plain cleanup callback as a {@link Disposable}. */
export function toDisposable(cleanup: () => void): Disposable {
  return { dispose: cleanup };
}

export abstract class DisposableCollection implements Disposable {
  protected disposables: Disposable[] = [];

  dispose(): void {
    this.disposables.forEach((disposable) => disposable.dispose());
    this.disposables = [];
  }
}
