/** Base for DOM bindings whose listeners can be detached together. */
export abstract class Binding {
  protected readonly listeners = new AbortController();

  protected get signal(): AbortSignal {
    return this.listeners.signal;
  }

  dispose() {
    this.listeners.abort();
  }
}
